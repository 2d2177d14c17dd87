/**
 * Leveled logger
 *
 * Everything goes to stderr: stdout belongs to the MCP stdio transport.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/**
 * Errors stringify to `{}`, so flatten them before JSON encoding
 */
function serializeMeta(meta: unknown): string {
  if (meta instanceof Error) {
    const code = 'code' in meta ? ` (${String(meta.code)})` : '';
    return ` ${meta.name}: ${meta.message}${code}`;
  }
  try {
    return ` ${JSON.stringify(meta)}`;
  } catch {
    return ` ${String(meta)}`;
  }
}

export class Logger {
  private level: LogLevel = 'info';

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  isLevelEnabled(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.level];
  }

  private format(level: LogLevel, message: string, meta?: unknown): string {
    const timestamp = new Date().toISOString();
    const metaStr = meta === undefined ? '' : serializeMeta(meta);
    return `[${timestamp}] [${level.toUpperCase()}] ${message}${metaStr}`;
  }

  private write(level: LogLevel, message: string, meta?: unknown): void {
    if (this.isLevelEnabled(level)) {
      console.error(this.format(level, message, meta));
    }
  }

  debug(message: string, meta?: unknown): void {
    this.write('debug', message, meta);
  }

  info(message: string, meta?: unknown): void {
    this.write('info', message, meta);
  }

  warn(message: string, meta?: unknown): void {
    this.write('warn', message, meta);
  }

  error(message: string, meta?: unknown): void {
    this.write('error', message, meta);
  }
}

export const logger = new Logger();
