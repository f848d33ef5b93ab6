// worldcore/utils/logger.ts

import { Colors, colorize, type ColorCode } from "./colors";
import { logEnabled, type LogLevel } from "../config/logconfig";

export type LogSink = (line: string, ...meta: unknown[]) => void;

const consoleSink: LogSink = (line, ...meta) => console.log(line, ...meta);

let activeSink: LogSink = consoleSink;

/**
 * Redirect all logger output. Pass null to restore console output.
 * Tests use this to capture or silence lines.
 */
export function setLogSink(sink: LogSink | null): void {
  activeSink = sink ?? consoleSink;
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
  private constructor(private readonly scope: string) {}

  static scope(scope: string): Logger {
    return new Logger(scope.toUpperCase());
  }

  private write(level: LogLevel, color: ColorCode, message: string, meta: unknown[]): void {
    if (!logEnabled(this.scope, level)) return;

    const tag = colorize(`[${this.scope}:${level.toUpperCase()}]`, color);
    const line = `${timestamp()} ${tag} ${message}`;

    if (meta.length === 0) {
      activeSink(line);
    } else {
      activeSink(line, ...meta.map(maybeFormatError));
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

  // Info level with a bright tag, for milestones worth spotting in a busy log.
  success(message: string, ...meta: unknown[]): void {
    this.write("info", Colors.BrightGreen, message, meta);
  }
}
