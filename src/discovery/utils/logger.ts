/**
 * Structured logger for service discovery
 *
 * Thin layer over pino. The log level can be controlled via the
 * MESH_DISCOVERY_LOG_LEVEL environment variable.
 */

import { pino, type Logger, type LevelWithSilent } from 'pino';

export type { Logger };

export type LogLevel = LevelWithSilent;

const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

function isLogLevel(value: string | undefined): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Resolve the effective log level (explicit > env > 'info')
 */
export function resolveLogLevel(level?: LogLevel): LogLevel {
  if (level) return level;
  const envLevel = process.env.MESH_DISCOVERY_LOG_LEVEL?.toLowerCase();
  return isLogLevel(envLevel) ? envLevel : 'info';
}

/**
 * Create a logger instance
 *
 * @param component - Component name bound to every line (e.g. 'ServiceDiscovery')
 * @param level - Optional log level override
 *
 * @example
 * ```typescript
 * const logger = createLogger('ServiceDiscovery', 'debug');
 * logger.info({ services: 2 }, 'Registered services');
 * ```
 */
export function createLogger(component: string, level?: LogLevel): Logger {
  return pino({ level: resolveLogLevel(level), base: { component } });
}

/**
 * Create a child logger with a namespaced component
 */
export function childLogger(parent: Logger, component: string): Logger {
  return parent.child({ component });
}
