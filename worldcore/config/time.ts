// worldcore/config/time.ts

export const Second = 1000;
export const Minute = Second * 60;
export const Hour = Minute * 60;

// Default heartbeat period: two beats per second.
export const HEARTBEAT_TIME_MS = 500;

// Anything faster than this is a misconfiguration, not a heartbeat.
export const MIN_HEARTBEAT_MS = 10;
