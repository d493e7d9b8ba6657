#!/usr/bin/env node
/**
 * NutriScan MCP server entry point.
 */

// Load environment variables from .env file
import dotenv from 'dotenv';
dotenv.config();

import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { ZodError } from 'zod';

import { loadConfig, type AppConfig } from './config.js';
import { createMcpServer, type ServerDependencies } from './server.js';
import { setupStreamableHttpServer } from './streamable-http.js';
import { OpenFoodFactsClient, ZxingDecoder } from './food-pipeline/index.js';
import { createStoreFinder } from './food-pipeline/stores/index.js';

function buildDependencies(config: AppConfig): ServerDependencies {
  return {
    config,
    database: new OpenFoodFactsClient({
      baseUrl: config.offBaseUrl,
      userAgent: config.offUserAgent,
      timeoutMs: config.httpTimeoutMs,
    }),
    decoder: new ZxingDecoder(),
    storeFinder: createStoreFinder(config),
  };
}

/**
 * Main function to start the server
 */
async function main() {
  let config: AppConfig;
  try {
    config = loadConfig();
  } catch (error) {
    if (error instanceof ZodError) {
      for (const issue of error.issues) {
        console.error(`Invalid configuration: ${issue.path.join('.')}: ${issue.message}`);
      }
      process.exit(1);
    }
    throw error;
  }

  const deps = buildDependencies(config);
  console.error(`[mcp] Market: ${config.targetCountry}, scan mode: ${config.scanMode}, store finder: ${deps.storeFinder.name}`);

  if (config.transport === 'stdio') {
    const server = createMcpServer(deps);
    await server.connect(new StdioServerTransport());
    console.error('[mcp] Listening on stdio');
    return;
  }

  try {
    await setupStreamableHttpServer(() => createMcpServer(deps), config.port);
  } catch (error) {
    console.error("Error setting up StreamableHTTP server:", error);
    process.exit(1);
  }
}

/**
 * Cleanup function for graceful shutdown
 */
async function cleanup() {
  console.error("Shutting down MCP server...");
  process.exit(0);
}

// Register signal handlers
process.on('SIGINT', cleanup);
process.on('SIGTERM', cleanup);

// Start the server
main().catch((error) => {
  console.error("Fatal error in main execution:", error);
  process.exit(1);
});
