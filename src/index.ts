/**
 * Main entry point for Azure Functions v4
 *
 * Importing a function file runs its app.http() calls, which registers the
 * handlers with the shared @azure/functions app object.
 */

// Initialize error tracking and monitoring before anything else
import { initializeSentry } from './lib/utils/sentry';
import { initializeTelemetry } from './lib/utils/telemetry';
import { validateConfig } from './types/config';
import { toError } from './lib/utils/errors';
import * as logger from './lib/utils/logger';

initializeSentry();
initializeTelemetry();

try {
  validateConfig();
} catch (err) {
  logger.logError('Configuration is incomplete', toError(err));
}

import './knowledgeApi';
