import { Buffer } from "node:buffer";
import { appendFile, mkdir, rename, rm, stat } from "node:fs/promises";
import { dirname } from "node:path";

const REDACTED = "[REDACTED]";

const REDACT_ON = new Set(["on", "true", "yes", "1", "enable", "enabled"]);
const REDACT_OFF = new Set(["off", "false", "no", "0", "disable", "disabled"]);

/** Payload keys (case-insensitive) whose values are always masked once redaction is on. */
const SENSITIVE_KEYS = new Set([
  "authorization",
  "api_key",
  "api-key",
  "token",
  "access_token",
  "refresh_token",
  "password",
  "secret",
]);

const DEFAULT_MAX_FILE_BYTES = 5 * 1024 * 1024;
const DEFAULT_MAX_FILE_COUNT = 5;

export interface RedactionDirectives {
  enabled: boolean;
  /** Substrings scrubbed from every string value of a payload. */
  tokens: string[];
}

/**
 * Parses `IRPLAN_LOG_REDACT`: a comma-separated list mixing toggles
 * (`on`/`off` and synonyms) with secret substrings, e.g. `"on,tenant-"`.
 * Listing substrings without a toggle turns redaction on; the last toggle wins.
 */
export function parseRedactionDirectives(raw: string | undefined): RedactionDirectives {
  if (!raw) {
    return { enabled: false, tokens: [] };
  }
  let enabled: boolean | undefined;
  const tokens = new Set<string>();
  for (const part of raw.split(",")) {
    const directive = part.trim();
    if (directive.length === 0) {
      continue;
    }
    const lower = directive.toLowerCase();
    if (REDACT_OFF.has(lower)) {
      enabled = false;
    } else if (REDACT_ON.has(lower)) {
      enabled = true;
    } else {
      tokens.add(directive);
    }
  }
  return { enabled: enabled ?? tokens.size > 0, tokens: [...tokens] };
}

/** Masks sensitive keys and scrubs `secrets` from strings, at any depth. */
export function redactPayload(value: unknown, secrets: ReadonlyArray<string | RegExp>): unknown {
  if (typeof value === "string") {
    return secrets.reduce<string>((text, secret) => {
      if (secret instanceof RegExp) {
        return text.replace(secret, REDACTED);
      }
      return secret.length > 0 ? text.split(secret).join(REDACTED) : text;
    }, value);
  }
  if (Array.isArray(value)) {
    return value.map((item) => redactPayload(item, secrets));
  }
  if (value && typeof value === "object") {
    const masked: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(value)) {
      masked[key] = SENSITIVE_KEYS.has(key.toLowerCase()) ? REDACTED : redactPayload(entry, secrets);
    }
    return masked;
  }
  return value;
}

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  /** snake_case event name, e.g. `plan_synthesized`. */
  message: string;
  payload?: unknown;
}

export interface LoggerOptions {
  /** Mirror every line to this file; `null` or absent disables mirroring. */
  readonly logFile?: string | null;
  /** The active file is rotated before it would grow past this size. */
  readonly maxFileSizeBytes?: number;
  /** Files kept by rotation, the active one included. */
  readonly maxFileCount?: number;
  readonly redactSecrets?: Array<string | RegExp>;
  /** Overrides the toggle read from `IRPLAN_LOG_REDACT`. */
  readonly redactionEnabled?: boolean;
  /** Mutes stdout; the file mirror and the listener still receive entries. */
  readonly silent?: boolean;
  readonly onEntry?: (entry: LogEntry) => void;
}

function isMissingFileError(error: unknown): boolean {
  return typeof error === "object" && error !== null && "code" in error && error.code === "ENOENT";
}

/**
 * JSON-lines logger. Each entry goes to stdout, to the optional listener and,
 * when configured, to a size-rotated log file. File appends are chained on a
 * single promise so lines land in emission order; {@link flush} awaits them.
 */
export class StructuredLogger {
  private readonly logFile: string | undefined;
  private readonly maxFileSizeBytes: number;
  private readonly maxFileCount: number;
  private readonly secrets: Array<string | RegExp>;
  private readonly redactionEnabled: boolean;
  private readonly silent: boolean;
  private readonly onEntry: ((entry: LogEntry) => void) | undefined;
  private pendingWrites: Promise<void> = Promise.resolve();
  private directoryReady = false;

  constructor(options: LoggerOptions = {}) {
    const directives = parseRedactionDirectives(process.env.IRPLAN_LOG_REDACT);
    this.logFile = options.logFile ?? undefined;
    this.maxFileSizeBytes = options.maxFileSizeBytes ?? DEFAULT_MAX_FILE_BYTES;
    this.maxFileCount = Math.max(1, options.maxFileCount ?? DEFAULT_MAX_FILE_COUNT);
    this.secrets = [...new Set<string | RegExp>([...directives.tokens, ...(options.redactSecrets ?? [])])];
    this.redactionEnabled = options.redactionEnabled ?? directives.enabled;
    this.silent = options.silent ?? false;
    this.onEntry = options.onEntry;
  }

  debug(message: string, payload?: unknown): void {
    this.emit("debug", message, payload);
  }

  info(message: string, payload?: unknown): void {
    this.emit("info", message, payload);
  }

  warn(message: string, payload?: unknown): void {
    this.emit("warn", message, payload);
  }

  error(message: string, payload?: unknown): void {
    this.emit("error", message, payload);
  }

  /** Resolves once every queued file write has settled. */
  async flush(): Promise<void> {
    await this.pendingWrites;
  }

  private emit(level: LogLevel, message: string, payload: unknown): void {
    const entry: LogEntry = { timestamp: new Date().toISOString(), level, message };
    if (payload !== undefined) {
      entry.payload = this.redactionEnabled ? redactPayload(payload, this.secrets) : payload;
    }
    const line = `${JSON.stringify(entry)}\n`;
    if (!this.silent) {
      process.stdout.write(line);
    }
    this.onEntry?.(structuredClone(entry));
    if (this.logFile) {
      this.enqueueWrite(this.logFile, line);
    }
  }

  private enqueueWrite(logFile: string, line: string): void {
    this.pendingWrites = this.pendingWrites.then(async () => {
      try {
        if (!this.directoryReady) {
          await mkdir(dirname(logFile), { recursive: true });
          this.directoryReady = true;
        }
        await this.rotateIfNeeded(logFile, Buffer.byteLength(line, "utf8"));
        await appendFile(logFile, line, "utf8");
      } catch (error) {
        // Reported on stderr only; the directory is re-created on the next write.
        this.directoryReady = false;
        const failure: LogEntry = {
          timestamp: new Date().toISOString(),
          level: "error",
          message: "log_file_write_failed",
          payload: { file: logFile, message: error instanceof Error ? error.message : String(error) },
        };
        process.stderr.write(`${JSON.stringify(failure)}\n`);
      }
    });
  }

  /** Shifts `file` → `file.1` → `file.2` ..., dropping the oldest, when the next line would not fit. */
  private async rotateIfNeeded(logFile: string, incomingBytes: number): Promise<void> {
    let size: number;
    try {
      size = (await stat(logFile)).size;
    } catch (error) {
      if (isMissingFileError(error)) {
        return;
      }
      throw error;
    }
    if (size + incomingBytes <= this.maxFileSizeBytes) {
      return;
    }
    if (this.maxFileCount === 1) {
      await rm(logFile, { force: true });
      return;
    }
    await rm(`${logFile}.${this.maxFileCount - 1}`, { force: true });
    for (let generation = this.maxFileCount - 2; generation >= 0; generation -= 1) {
      const source = generation === 0 ? logFile : `${logFile}.${generation}`;
      try {
        await rename(source, `${logFile}.${generation + 1}`);
      } catch (error) {
        if (!isMissingFileError(error)) {
          throw error;
        }
      }
    }
  }
}

/** Logger used when a component is constructed without one: stdout muted, nothing mirrored. */
export function createSilentLogger(): StructuredLogger {
  return new StructuredLogger({ logFile: null, silent: true });
}
