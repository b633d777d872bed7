/**
 * Console logger with a component prefix and a minimum level
 */

/**
 * Log levels understood by the agent, lowest to highest severity.
 * OFF silences everything.
 */
export const LOG_LEVELS = ['DEBUG', 'INFO', 'WARN', 'ERROR', 'OFF'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

/**
 * Simple logger interface
 */
export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

/**
 * Map a configured level name to a LogLevel.
 * Matching is case-insensitive; blank means INFO. Returns null for unknown names.
 */
export function parseLogLevel(value: string): LogLevel | null {
  const normalized = value.trim().toUpperCase();
  if (normalized === '') return 'INFO';
  if (normalized === 'WARNING') return 'WARN';
  return isLogLevel(normalized) ? normalized : null;
}

function severity(level: LogLevel): number {
  return LOG_LEVELS.indexOf(level);
}

/**
 * Console logger implementation
 */
export class ConsoleLogger implements Logger {
  constructor(
    private readonly component: string,
    private readonly level: LogLevel = 'INFO',
  ) {}

  private enabled(level: LogLevel): boolean {
    return this.level !== 'OFF' && severity(level) >= severity(this.level);
  }

  debug(message: string, ...args: unknown[]): void {
    if (this.enabled('DEBUG')) console.debug(`[${this.component}] DEBUG:`, message, ...args);
  }

  info(message: string, ...args: unknown[]): void {
    if (this.enabled('INFO')) console.log(`[${this.component}] INFO:`, message, ...args);
  }

  warn(message: string, ...args: unknown[]): void {
    if (this.enabled('WARN')) console.warn(`[${this.component}] WARN:`, message, ...args);
  }

  error(message: string, ...args: unknown[]): void {
    if (this.enabled('ERROR')) console.error(`[${this.component}] ERROR:`, message, ...args);
  }
}

export function createLogger(component: string, level: LogLevel = 'INFO'): Logger {
  return new ConsoleLogger(component, level);
}
