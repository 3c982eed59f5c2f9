import { StructuredLogger, type LogLevel } from "../../src/logger.js";

export interface RecordedEntry {
  level: LogLevel;
  message: string;
  payload?: unknown;
}

/**
 * Captures log calls in memory instead of printing them. Subclasses the real
 * logger so components accept it unchanged.
 */
export class RecordingLogger extends StructuredLogger {
  public readonly entries: RecordedEntry[] = [];

  constructor() {
    super({ logFile: null, redactionEnabled: false, silent: true });
  }

  override debug(message: string, payload?: unknown): void {
    this.entries.push({ level: "debug", message, payload });
  }

  override info(message: string, payload?: unknown): void {
    this.entries.push({ level: "info", message, payload });
  }

  override warn(message: string, payload?: unknown): void {
    this.entries.push({ level: "warn", message, payload });
  }

  override error(message: string, payload?: unknown): void {
    this.entries.push({ level: "error", message, payload });
  }

  /** Messages emitted so far, optionally restricted to one level. */
  messages(level?: LogLevel): string[] {
    return this.entries.filter((entry) => level === undefined || entry.level === level).map((entry) => entry.message);
  }
}
