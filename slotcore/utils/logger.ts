//slotcore/utils/logger.ts

import { Colors, colorize, ColorCode } from "./colors";
import { LogLevel, logEnabled } from "../config/logconfig";

export type LogSink = (line: string, ...meta: unknown[]) => void;

let sink: LogSink = (line, ...meta) => console.log(line, ...meta);

/** Redirect log output (tests capture lines this way). Returns the previous sink. */
export function setLogSink(next: LogSink): LogSink {
  const prev = sink;
  sink = next;
  return prev;
}

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

function maybeFormatError(value: unknown): unknown {
  if (value instanceof Error) {
    return {
      error: value.message,
      name: value.name,
      stack: value.stack,
    };
  }
  return value;
}

export class Logger {
  private constructor(private scope: string) {}

  static scope(scope: string): Logger {
    return new Logger(scope.toUpperCase());
  }

  private write(level: LogLevel, color: ColorCode, message: string, meta: unknown[]): void {
    if (!logEnabled(this.scope, level)) return;

    const tag = colorize(`[${this.scope}:${level.toUpperCase()}]`, color);
    sink(`${timestamp()} ${tag} ${message}`, ...meta.map(maybeFormatError));
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
}
