/**
 * Structured logging utilities
 *
 * Every line goes to the console and is forwarded to Application Insights
 * and Sentry for cloud monitoring.
 */

import { trackTrace, trackException, SeverityLevel } from './telemetry';
import { captureException, captureMessage, addBreadcrumb } from './sentry';
import { getConfig } from '../../types/config';

export enum LogLevel {
  DEBUG = 'DEBUG',
  INFO = 'INFO',
  WARN = 'WARN',
  ERROR = 'ERROR',
}

export interface LogContext {
  [key: string]: unknown;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 0,
  [LogLevel.INFO]: 1,
  [LogLevel.WARN]: 2,
  [LogLevel.ERROR]: 3,
};

/**
 * Minimum level from LOG_LEVEL (default INFO). Unknown values fall back to INFO.
 */
export function minimumLevel(): LogLevel {
  const configured = getConfig('LOG_LEVEL', LogLevel.INFO).toUpperCase();
  switch (configured) {
    case LogLevel.DEBUG:
      return LogLevel.DEBUG;
    case LogLevel.WARN:
      return LogLevel.WARN;
    case LogLevel.ERROR:
      return LogLevel.ERROR;
    default:
      return LogLevel.INFO;
  }
}

function isEnabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[minimumLevel()];
}

/**
 * Formats a log message with timestamp and context
 */
function formatLogMessage(
  level: LogLevel,
  message: string,
  context?: LogContext
): string {
  const timestamp = new Date().toISOString();
  const contextStr = context ? ` | ${JSON.stringify(context)}` : '';
  return `[${timestamp}] [${level}] ${message}${contextStr}`;
}

/**
 * Convert LogContext to string properties for Application Insights
 */
function contextToProperties(context?: LogContext): Record<string, string> | undefined {
  if (!context) return undefined;

  const properties: Record<string, string> = {};
  for (const [key, value] of Object.entries(context)) {
    if (value === undefined) continue;
    properties[key] = typeof value === 'object' ? JSON.stringify(value) : String(value);
  }
  return properties;
}

/**
 * Log debug message
 */
export function debug(message: string, context?: LogContext): void {
  if (!isEnabled(LogLevel.DEBUG)) return;
  console.debug(formatLogMessage(LogLevel.DEBUG, message, context));
  trackTrace(message, SeverityLevel.Verbose, contextToProperties(context));
  addBreadcrumb(message, 'debug', 'debug', context);
}

/**
 * Log informational message
 */
export function info(message: string, context?: LogContext): void {
  if (!isEnabled(LogLevel.INFO)) return;
  console.info(formatLogMessage(LogLevel.INFO, message, context));
  trackTrace(message, SeverityLevel.Information, contextToProperties(context));
  addBreadcrumb(message, 'info', 'info', context);
}

/**
 * Log warning message
 */
export function warn(message: string, context?: LogContext): void {
  if (!isEnabled(LogLevel.WARN)) return;
  console.warn(formatLogMessage(LogLevel.WARN, message, context));
  trackTrace(message, SeverityLevel.Warning, contextToProperties(context));
  captureMessage(message, 'warning', context);
}

/**
 * Log error message
 */
export function error(message: string, context?: LogContext): void {
  if (!isEnabled(LogLevel.ERROR)) return;
  console.error(formatLogMessage(LogLevel.ERROR, message, context));
  trackTrace(message, SeverityLevel.Error, contextToProperties(context));
  captureMessage(message, 'error', context);
}

/**
 * Log error with full error object details
 *
 * Errors wrapping an upstream failure (`originalError`) also log its message.
 */
export function logError(message: string, err: Error, context?: LogContext): void {
  const cause: unknown = Reflect.get(err, 'originalError');
  const errorContext = {
    ...context,
    errorName: err.name,
    errorMessage: err.message,
    ...(cause instanceof Error && { causeMessage: cause.message }),
    errorStack: err.stack,
  };
  error(message, errorContext);

  trackException(err, contextToProperties(context));
  captureException(err, context);
}
