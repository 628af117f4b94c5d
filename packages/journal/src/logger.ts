import type { Logger, LogLevel } from "@goapbot/schemas";

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_ORDER;
}

export function resolveLogLevel(raw: string | undefined, fallback: LogLevel = "info"): LogLevel {
  const normalized = raw?.trim().toLowerCase();
  return normalized && isLogLevel(normalized) ? normalized : fallback;
}

export class ConsoleLogger implements Logger {
  private prefix: string;
  private threshold: number;

  constructor(component: string, level: LogLevel = resolveLogLevel(process.env.GOAPBOT_LOG_LEVEL)) {
    // Control characters in a component name would let it forge log lines
    // biome-ignore lint/suspicious/noControlCharactersInRegex: intentional sanitization of control chars
    const safe = component.replace(/[\x00-\x1f\x7f]/g, "_").slice(0, 64);
    this.prefix = `[goapbot:${safe}]`;
    this.threshold = LEVEL_ORDER[level];
  }

  debug(message: string, data?: Record<string, unknown>): void {
    if (this.threshold > LEVEL_ORDER.debug) return;
    console.debug(`${this.prefix} ${message}`, data !== undefined ? data : "");
  }

  info(message: string, data?: Record<string, unknown>): void {
    if (this.threshold > LEVEL_ORDER.info) return;
    console.log(`${this.prefix} ${message}`, data !== undefined ? data : "");
  }

  warn(message: string, data?: Record<string, unknown>): void {
    if (this.threshold > LEVEL_ORDER.warn) return;
    console.warn(`${this.prefix} ${message}`, data !== undefined ? data : "");
  }

  error(message: string, data?: Record<string, unknown>): void {
    console.error(`${this.prefix} ${message}`, data !== undefined ? data : "");
  }
}

export function createLogger(component: string, level?: LogLevel): Logger {
  return new ConsoleLogger(component, level);
}

/** Discards everything. For callers that want the journal as their only record. */
export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
