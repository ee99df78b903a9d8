// worldcore/utils/colors.ts

// ANSI codes for the scoped console logger.
export const Colors = {
  Reset: "\x1b[0m",

  FgRed: "\x1b[31m",
  FgGreen: "\x1b[32m",
  FgYellow: "\x1b[33m",

  BrightGreen: "\x1b[92m",
  BrightCyan: "\x1b[96m",
} as const;

export type ColorCode = (typeof Colors)[keyof typeof Colors];

export function colorize(text: string, color: ColorCode): string {
  // NO_COLOR (https://no-color.org) and non-TTY log files get plain tags.
  if (process.env.NO_COLOR || !process.stdout.isTTY) return text;
  return `${color}${text}${Colors.Reset}`;
}
