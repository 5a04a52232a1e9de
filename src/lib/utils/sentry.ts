/**
 * Sentry error tracking and performance monitoring
 *
 * Provides error capture, breadcrumbs and performance spans for the
 * knowledge service functions.
 */

import * as Sentry from '@sentry/node';
import { nodeProfilingIntegration } from '@sentry/profiling-node';
import { getConfig } from '../../types/config';

let isInitialized = false;

/**
 * Initialize Sentry with Azure Functions configuration
 *
 * This should be called once at application startup.
 */
export function initializeSentry(): void {
  if (isInitialized) {
    return;
  }

  const dsn = getConfig('SENTRY_DSN', '');
  const environment = getConfig('SENTRY_ENVIRONMENT', 'development');
  const release = getConfig('SENTRY_RELEASE', '') || undefined;

  if (!dsn) {
    console.warn('[Sentry] SENTRY_DSN not configured. Error tracking disabled.');
    isInitialized = true;
    return;
  }

  try {
    Sentry.init({
      dsn,
      environment,
      release,

      // 10% in prod, 100% elsewhere
      tracesSampleRate: environment === 'production' ? 0.1 : 1.0,
      profilesSampleRate: environment === 'production' ? 0.1 : 1.0,
      integrations: [nodeProfilingIntegration()],

      maxBreadcrumbs: 50,
      attachStacktrace: true,

      initialScope: {
        tags: {
          runtime: 'azure-functions',
          'node.version': process.version,
        },
      },
    });

    console.info('[Sentry] Error tracking initialized successfully');
    isInitialized = true;
  } catch (error) {
    console.error('[Sentry] Failed to initialize:', error);
    isInitialized = true;
  }
}

/**
 * Check if Sentry is initialized and configured
 */
export function isSentryEnabled(): boolean {
  return isInitialized && !!getConfig('SENTRY_DSN', '');
}

/**
 * Capture an exception and send to Sentry
 *
 * @returns Event ID from Sentry
 */
export function captureException(
  error: Error,
  context?: Record<string, unknown>
): string | undefined {
  if (!isSentryEnabled()) {
    return undefined;
  }

  return Sentry.captureException(error, {
    extra: context,
  });
}

/**
 * Capture a message and send to Sentry
 */
export function captureMessage(
  message: string,
  level: Sentry.SeverityLevel = 'info',
  context?: Record<string, unknown>
): string | undefined {
  if (!isSentryEnabled()) {
    return undefined;
  }

  return Sentry.captureMessage(message, {
    level,
    extra: context,
  });
}

/**
 * Add breadcrumb for tracking pipeline steps
 *
 * Breadcrumbs provide context leading up to an error.
 */
export function addBreadcrumb(
  message: string,
  category: string,
  level: Sentry.SeverityLevel = 'info',
  data?: Record<string, unknown>
): void {
  if (!isSentryEnabled()) {
    return;
  }

  Sentry.addBreadcrumb({
    message,
    category,
    level,
    data,
    timestamp: Date.now() / 1000,
  });
}

/**
 * Set custom tag for filtering and grouping errors
 */
export function setTag(key: string, value: string): void {
  if (!isSentryEnabled()) {
    return;
  }

  Sentry.setTag(key, value);
}

/**
 * Set multiple tags at once
 */
export function setTags(tags: Record<string, string>): void {
  if (!isSentryEnabled()) {
    return;
  }

  Sentry.setTags(tags);
}

/**
 * Runs an async operation inside a Sentry performance span
 *
 * @param name - Span name
 * @param op - Operation type (e.g. 'http.request', 'rag.ingest')
 * @param operation - The work to measure
 */
export async function withSpan<T>(
  name: string,
  op: string,
  operation: () => Promise<T>
): Promise<T> {
  if (!isSentryEnabled()) {
    return operation();
  }

  return Sentry.startSpan({ name, op }, () => operation());
}

/**
 * Wrap an Azure Function handler with Sentry error tracking and performance monitoring
 *
 * @param functionName - Name of the function
 * @param handler - The Azure Function handler to wrap
 * @returns Wrapped handler with Sentry instrumentation
 */
export function wrapAzureFunction<A extends unknown[], R>(
  functionName: string,
  handler: (...args: A) => Promise<R>
): (...args: A) => Promise<R> {
  return async (...args: A): Promise<R> => {
    if (!isSentryEnabled()) {
      return handler(...args);
    }

    setTags({
      function: functionName,
      runtime: 'azure-functions',
    });

    addBreadcrumb(`Function ${functionName} invoked`, 'function', 'info', {
      functionName,
    });

    try {
      return await withSpan(functionName, 'azure.function', () => handler(...args));
    } catch (error) {
      captureException(error instanceof Error ? error : new Error(String(error)), {
        functionName,
      });
      throw error;
    }
  };
}

// Re-export commonly used Sentry types
export type { SeverityLevel } from '@sentry/node';
