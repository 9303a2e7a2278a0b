import fs from "node:fs";
import path from "node:path";
import { redactSensitiveInfo, sanitizeLogMessage } from "./redact.js";

export type OutputFormat = "human" | "jsonl";

export type LogLevel = "info" | "warn" | "error";

export type LogEvent = {
  level: LogLevel;
  code: string;
  message: string;
  [field: string]: unknown;
};

export type ReporterSink = {
  out: (line: string) => void;
  err: (line: string) => void;
};

const processSink: ReporterSink = {
  out: (line) => process.stdout.write(line + "\n"),
  err: (line) => process.stderr.write(line + "\n"),
};

/**
 * Emits run events to the console (human lines or JSONL) and mirrors every
 * event into the run's progress log once one is attached.
 */
export class Reporter {
  private logFile: string | null = null;

  constructor(
    readonly format: OutputFormat = "human",
    private readonly sink: ReporterSink = processSink,
  ) {}

  /** Start appending events to `filePath`. */
  attachLogFile(filePath: string): void {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    this.logFile = filePath;
  }

  info(code: string, message: string, fields: Record<string, unknown> = {}): void {
    this.emit({ ...fields, level: "info", code, message });
  }

  warn(code: string, message: string, fields: Record<string, unknown> = {}): void {
    this.emit({ ...fields, level: "warn", code, message });
  }

  error(code: string, message: string, fields: Record<string, unknown> = {}): void {
    this.emit({ ...fields, level: "error", code, message });
  }

  emit(event: LogEvent): void {
    const clean: LogEvent = { ...event, message: redactSensitiveInfo(event.message) };

    if (this.format === "jsonl") {
      this.sink.out(JSON.stringify(clean));
    } else {
      const line = formatHuman(clean);
      if (clean.level === "info") this.sink.out(line);
      else this.sink.err(line);
    }

    if (this.logFile) {
      const stamp = new Date().toISOString();
      fs.appendFileSync(
        this.logFile,
        `${stamp} ${clean.level.toUpperCase()} ${clean.code} ${sanitizeLogMessage(clean.message)}\n`,
        "utf8",
      );
    }
  }
}

function formatHuman(event: LogEvent): string {
  const prefix = event.level === "info" ? "" : `${event.level}: `;
  return `${prefix}${event.message}`;
}
