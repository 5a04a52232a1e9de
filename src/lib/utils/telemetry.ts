/**
 * Application Insights telemetry utilities
 *
 * Provides custom event tracking, metrics, and dependencies for the knowledge service.
 */

import * as appInsights from 'applicationinsights';
import { getConfig } from '../../types/config';

/**
 * Severity levels for telemetry traces
 */
export const SeverityLevel = appInsights.Contracts.SeverityLevel;
export type SeverityLevel = appInsights.Contracts.SeverityLevel;

/**
 * Telemetry client instance
 */
let telemetryClient: appInsights.TelemetryClient | null = null;
let isInitialized = false;

/**
 * Initialize Application Insights
 *
 * This should be called once at application startup. Without
 * APPLICATIONINSIGHTS_CONNECTION_STRING every tracking call is a no-op.
 */
export function initializeTelemetry(): void {
  if (isInitialized) {
    return;
  }

  const connectionString = getConfig('APPLICATIONINSIGHTS_CONNECTION_STRING', '');

  if (!connectionString) {
    console.warn(
      '[Telemetry] APPLICATIONINSIGHTS_CONNECTION_STRING not configured. Custom telemetry disabled.'
    );
    isInitialized = true;
    return;
  }

  try {
    appInsights
      .setup(connectionString)
      .setAutoCollectRequests(true)
      .setAutoCollectPerformance(true, true)
      .setAutoCollectExceptions(true)
      .setAutoCollectDependencies(true)
      .setAutoCollectConsole(true, true)
      .setUseDiskRetryCaching(true)
      .setSendLiveMetrics(false)
      .setDistributedTracingMode(appInsights.DistributedTracingModes.AI_AND_W3C);

    appInsights.start();

    telemetryClient = appInsights.defaultClient;

    telemetryClient.context.tags[telemetryClient.context.keys.cloudRole] =
      'rag-knowledge-service';

    console.info('[Telemetry] Application Insights initialized successfully');
    isInitialized = true;
  } catch (error) {
    console.error('[Telemetry] Failed to initialize Application Insights:', error);
    isInitialized = true;
  }
}

/**
 * Get the telemetry client instance
 */
export function getTelemetryClient(): appInsights.TelemetryClient | null {
  if (!isInitialized) {
    initializeTelemetry();
  }
  return telemetryClient;
}

/**
 * Track a custom event
 *
 * @param name - Event name
 * @param properties - Custom properties
 * @param measurements - Custom measurements (numeric values)
 */
export function trackEvent(
  name: string,
  properties?: Record<string, string>,
  measurements?: Record<string, number>
): void {
  const client = getTelemetryClient();
  if (client) {
    client.trackEvent({
      name,
      properties,
      measurements,
    });
  }
}

/**
 * Track a custom metric
 */
export function trackMetric(
  name: string,
  value: number,
  properties?: Record<string, string>
): void {
  const client = getTelemetryClient();
  if (client) {
    client.trackMetric({
      name,
      value,
      properties,
    });
  }
}

/**
 * Track a dependency (embedding provider call, vector store request, etc.)
 *
 * @param name - Dependency name
 * @param dependencyTypeName - Dependency type (e.g., 'OpenAI API', 'Pinecone', 'Qdrant')
 * @param data - Command or request data
 * @param duration - Duration in milliseconds
 * @param success - Whether the dependency call succeeded
 * @param resultCode - Result code (HTTP status, error code, etc.)
 */
export function trackDependency(
  name: string,
  dependencyTypeName: string,
  data: string,
  duration: number,
  success: boolean,
  resultCode?: number,
  properties?: Record<string, string>
): void {
  const client = getTelemetryClient();
  if (client) {
    client.trackDependency({
      name,
      dependencyTypeName,
      data,
      duration,
      success,
      resultCode: resultCode ?? (success ? 0 : 1),
      properties,
    });
  }
}

/**
 * Track an exception
 */
export function trackException(
  error: Error,
  properties?: Record<string, string>
): void {
  const client = getTelemetryClient();
  if (client) {
    client.trackException({
      exception: error,
      properties,
    });
  }
}

/**
 * Track a trace (custom log message)
 */
export function trackTrace(
  message: string,
  severity: SeverityLevel = SeverityLevel.Information,
  properties?: Record<string, string>
): void {
  const client = getTelemetryClient();
  if (client) {
    client.trackTrace({
      message,
      severity,
      properties,
    });
  }
}

/**
 * Measures and tracks the execution time of an async operation
 *
 * @param name - Operation name
 * @param operation - The async operation to execute
 * @param properties - Custom properties
 * @returns The result of the operation
 */
export async function trackOperation<T>(
  name: string,
  operation: () => Promise<T>,
  properties?: Record<string, string>
): Promise<T> {
  const startTime = Date.now();
  let success = true;
  let error: Error | undefined;

  try {
    return await operation();
  } catch (err) {
    success = false;
    error = err instanceof Error ? err : new Error(String(err));
    trackException(error, { ...properties, operation: name });
    throw err;
  } finally {
    const duration = Date.now() - startTime;
    trackEvent(
      name,
      {
        ...properties,
        success: success.toString(),
        ...(error && { errorMessage: error.message }),
      },
      { duration }
    );
  }
}
