// worldcore/utils/logger.ts

import { Colors, colorize, type ColorCode } from "./colors";
import { type LogLevel, logEnabled } from "../config/logconfig";

function timestamp(): string {
  const d = new Date();
  const h = String(d.getHours()).padStart(2, "0");
  const m = String(d.getMinutes()).padStart(2, "0");
  const s = String(d.getSeconds()).padStart(2, "0");
  const ms = String(d.getMilliseconds()).padStart(3, "0");
  return `${h}:${m}:${s}.${ms}`;
}

function levelColor(level: LogLevel): ColorCode {
  switch (level) {
    case "debug":
      return Colors.BrightCyan;
    case "info":
      return Colors.FgGreen;
    case "warn":
      return Colors.FgYellow;
    case "error":
    default:
      return Colors.FgRed;
  }
}

export function formatMeta(value: unknown): unknown {
  if (value instanceof Error) {
    return {
      error: value.message,
      name: value.name,
      stack: value.stack,
    };
  }

  // Expand errors nested one level down, e.g. log.warn("...", { err })
  if (value && typeof value === "object" && !Array.isArray(value)) {
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(value)) {
      out[k] = v instanceof Error ? formatMeta(v) : v;
    }
    return out;
  }

  return value;
}

export class Logger {
  private constructor(private readonly scope: string) {}

  static scope(scope: string): Logger {
    return new Logger(scope.toUpperCase());
  }

  private write(level: LogLevel, color: ColorCode, message: string, meta: unknown[]): void {
    if (!logEnabled(this.scope, level)) return;

    const tag = colorize(`[${this.scope}:${level.toUpperCase()}]`, color);
    const line = `${timestamp()} ${tag} ${message}`;

    if (meta.length === 0) {
      console.log(line);
    } else {
      console.log(line, ...meta.map(formatMeta));
    }
  }

  debug(message: string, ...meta: unknown[]): void {
    this.write("debug", levelColor("debug"), message, meta);
  }

  info(message: string, ...meta: unknown[]): void {
    this.write("info", levelColor("info"), message, meta);
  }

  warn(message: string, ...meta: unknown[]): void {
    this.write("warn", levelColor("warn"), message, meta);
  }

  error(message: string, ...meta: unknown[]): void {
    this.write("error", levelColor("error"), message, meta);
  }

  // Convenience alias – logs at info level but with bright green tag
  success(message: string, ...meta: unknown[]): void {
    this.write("info", Colors.BrightGreen, message, meta);
  }
}
