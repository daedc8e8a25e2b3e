/**
 * Legal Assist - HTTP server
 *
 * Usage:
 *   npx tsx src/server/index.ts
 *
 * Environment: see .env.example
 */

import 'dotenv/config';
import { serve } from '@hono/node-server';
import { LegalAssistant } from '../assistant/legal-assistant.js';
import { type AssistantConfig, ConfigurationError, loadAssistantConfig, validateConfig } from '../config.js';
import { createModelClient } from '../core/model-client.js';
import { formatUsageCompact, UsageTracker } from '../usage.js';
import { createApp } from './app.js';

function loadConfigOrExit(): AssistantConfig {
  const validation = validateConfig();
  for (const warning of validation.warnings) {
    console.warn(`⚠ ${warning}`);
  }

  try {
    return loadAssistantConfig();
  } catch (error) {
    if (error instanceof ConfigurationError) {
      console.error(`Configuration Error:\n${error.message}`);
      process.exit(1);
    }
    throw error;
  }
}

function main(): void {
  const config = loadConfigOrExit();

  const tracker = new UsageTracker();
  const assistant = new LegalAssistant(createModelClient(config), config, {
    onTelemetry: (event) => {
      tracker.record(event);
      if (config.debug) {
        console.log(`[telemetry] ${event.operation} ${event.source} ${event.durationMs}ms attempts=${event.attempts}`);
      }
    }
  });

  const app = createApp(assistant, {
    apiToken: config.server.apiToken,
    logRequests: true
  });

  const server = serve({ fetch: app.fetch, port: config.server.port }, (info) => {
    console.log(`Legal Assist listening on http://localhost:${info.port} (model: ${config.model})`);
    if (!config.server.apiToken) {
      console.warn('⚠ ASSISTANT_API_TOKEN is not set; the API accepts unauthenticated requests');
    }
  });

  const shutdown = (): void => {
    console.log(`Shutting down. ${formatUsageCompact(tracker.getSummary())}`);
    server.close();
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

main();
