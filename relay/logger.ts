import { createLogger, format, transports, type Logger } from "winston";

export type { Logger };

export interface RelayLoggerOptions {
  level?: string;
  /** One JSON object per line instead of the human-readable layout. */
  json?: boolean;
  silent?: boolean;
}

/**
 * Builds the process-wide logger. Components receive it through their
 * constructor and tag their lines with `logger.child({ component })`.
 */
export function createRelayLogger(options: RelayLoggerOptions = {}): Logger {
  return createLogger({
    level: options.level ?? "info",
    silent: options.silent ?? false,
    format: format.combine(
      format.timestamp(),
      options.json ? format.json() : format.printf(renderLine)
    ),
    transports: [new transports.Console()],
  });
}

function renderLine(info: { [key: string]: unknown }): string {
  const { timestamp, level, message, component, ...meta } = info;
  const tag = component === undefined ? "relay" : String(component);
  const extra = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta, bigintReplacer)}` : "";
  return `${String(timestamp)} [${String(level).toUpperCase()}] [${tag}] ${String(message)}${extra}`;
}

function bigintReplacer(_key: string, value: unknown): unknown {
  if (typeof value === "bigint") {
    return value.toString();
  }
  if (value instanceof Error) {
    return value.message;
  }
  return value;
}
