/**
 * Structured logging for the vault guard.
 *
 * Every level goes to stderr: stdout belongs to the MCP stdio transport.
 */

import { getDebugConfig, isDebugComponent, isDebugEnabled } from './debug.js';

export enum LogLevel {
  ERROR = 'error',
  WARN = 'warn',
  INFO = 'info',
  DEBUG = 'debug',
}

export interface LogContext {
  [key: string]: unknown;
}

export function formatContext(context: LogContext): string {
  const entries = Object.entries(context);
  if (entries.length === 0) {
    return '';
  }

  const formatted = entries
    .map(([key, value]) => {
      if (typeof value === 'string') {
        return `${key}="${value}"`;
      }
      if (value === undefined || value === null) {
        return `${key}=${value}`;
      }
      if (typeof value === 'object') {
        return `${key}=${JSON.stringify(value)}`;
      }
      return `${key}=${String(value)}`;
    })
    .join(' ');

  return ` [${formatted}]`;
}

/**
 * Debug output is on when the global level is set, or when the level for
 * this component (VAULT_GUARD_DEBUG_<COMPONENT>) is.
 */
function shouldLogDebug(component: string): boolean {
  if (getDebugConfig().enabled) {
    return true;
  }
  const key = component.toLowerCase();
  return isDebugComponent(key) && isDebugEnabled(key);
}

/**
 * Log a message with structured context
 *
 * @param component - Component name (e.g., 'Whitelist', 'Vault', 'MCP')
 */
export function log(
  level: LogLevel,
  component: string,
  message: string,
  context?: LogContext
): void {
  if (level === LogLevel.DEBUG && !shouldLogDebug(component)) {
    return;
  }

  const timestamp = new Date().toISOString();
  const contextStr = context ? formatContext(context) : '';
  console.error(`[${timestamp}] ${component}:${level} - ${message}${contextStr}`);
}

export const logger = {
  error: (component: string, message: string, context?: LogContext) =>
    log(LogLevel.ERROR, component, message, context),

  warn: (component: string, message: string, context?: LogContext) =>
    log(LogLevel.WARN, component, message, context),

  info: (component: string, message: string, context?: LogContext) =>
    log(LogLevel.INFO, component, message, context),

  debug: (component: string, message: string, context?: LogContext) =>
    log(LogLevel.DEBUG, component, message, context),
};
