/**
 * StreamableHTTP server setup for HTTP-based MCP communication using Hono
 */
import { Hono, type Context } from 'hono';
import { cors } from 'hono/cors';
import { serve } from '@hono/node-server';
import { v4 as uuid } from 'uuid';
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { InitializeRequestSchema } from "@modelcontextprotocol/sdk/types.js";
import { toReqRes, toFetchResponse } from 'fetch-to-node';

import { runWithCountry } from './request-context.js';
import { SERVER_NAME, SERVER_VERSION } from './config.js';

/** Header selecting the market for alternative searches (e.g. "france", "united-kingdom"). */
export const COUNTRY_HEADER = 'X-Scan-Country';

// Constants
const SESSION_ID_HEADER_NAME = "mcp-session-id";
const JSON_RPC = "2.0";

/** Factory: create a new MCP Server per connection (SDK allows only one transport per Server). */
export type McpServerFactory = () => Server;

interface JsonRpcErrorBody {
  jsonrpc: typeof JSON_RPC;
  error: { code: number; message: string };
  id: string;
}

/**
 * StreamableHTTP MCP Server handler
 */
class MCPStreamableHttpServer {
  createServer: McpServerFactory;
  // Store active transports by session ID
  transports: { [sessionId: string]: StreamableHTTPServerTransport } = {};

  constructor(createServer: McpServerFactory) {
    this.createServer = createServer;
  }

  /**
   * Handle GET requests: return server info for discovery.
   * MCP Streamable HTTP uses POST for JSON-RPC; GET allows clients to discover the server.
   */
  async handleGetRequest(c: Context) {
    const accept = c.req.header('Accept') || '';
    if (accept.includes('text/event-stream')) {
      return c.text('Method Not Allowed', 405, {
        'Allow': 'POST',
        'Content-Type': 'text/plain'
      });
    }
    return c.json(
      {
        name: SERVER_NAME,
        version: SERVER_VERSION,
        transport: 'streamable-http',
        message: 'Use POST with JSON-RPC for MCP; include header mcp-session-id for existing sessions.',
        endpoint: '/mcp',
        countryHeader: COUNTRY_HEADER,
        countryHint: 'Send X-Scan-Country (an Open Food Facts country tag such as "france") to search alternatives in that market.'
      },
      200,
      {
        'Allow': 'POST, GET',
        'Cache-Control': 'no-store'
      }
    );
  }

  /**
   * Handle POST requests (all MCP communication).
   * Reads X-Scan-Country for the per-request market.
   */
  async handlePostRequest(c: Context) {
    const country = c.req.header(COUNTRY_HEADER)?.trim();
    return runWithCountry(country, () => this.handlePostRequestInner(c));
  }

  private async handlePostRequestInner(c: Context) {
    const sessionId = c.req.header(SESSION_ID_HEADER_NAME);
    console.error(`[mcp] POST request received ${sessionId ? 'with session ID: ' + sessionId : 'without session ID'}`);

    try {
      const body: unknown = await c.req.json();

      // Convert Fetch Request to Node.js req/res
      const { req, res } = toReqRes(c.req.raw);

      // Reuse existing transport if we have a session ID
      const existing = sessionId ? this.transports[sessionId] : undefined;
      if (existing) {
        await existing.handleRequest(req, res, body);
        return toFetchResponse(res);
      }

      // Create new transport for initialize requests (one Server per session)
      if (!sessionId && this.isInitializeRequest(body)) {
        console.error("[mcp] Creating new StreamableHTTP transport for initialize request");

        const server = this.createServer();
        const transport = new StreamableHTTPServerTransport({
          sessionIdGenerator: () => uuid(),
        });

        transport.onerror = (err) => {
          console.error('[mcp] StreamableHTTP transport error:', err);
        };

        await server.connect(transport);
        await transport.handleRequest(req, res, body);

        const newSessionId = transport.sessionId;
        if (newSessionId) {
          console.error(`[mcp] New session established: ${newSessionId}`);
          this.transports[newSessionId] = transport;

          transport.onclose = () => {
            console.error(`[mcp] Session closed: ${newSessionId}`);
            delete this.transports[newSessionId];
          };
        }

        return toFetchResponse(res);
      }

      // Invalid request (no session ID and not initialize)
      return c.json(
        this.createErrorResponse("Bad Request: invalid session ID or method."),
        400
      );
    } catch (error) {
      console.error('[mcp] Error handling MCP request:', error);
      return c.json(
        this.createErrorResponse("Internal server error."),
        500
      );
    }
  }

  /**
   * Create a JSON-RPC error response
   */
  private createErrorResponse(message: string): JsonRpcErrorBody {
    return {
      jsonrpc: JSON_RPC,
      error: {
        code: -32000,
        message: message,
      },
      id: uuid(),
    };
  }

  /**
   * Check if the request is an initialize request
   */
  private isInitializeRequest(body: unknown): boolean {
    const isInitial = (data: unknown) => InitializeRequestSchema.safeParse(data).success;

    if (Array.isArray(body)) {
      return body.some((request: unknown) => isInitial(request));
    }

    return isInitial(body);
  }
}

/**
 * Builds the Hono app serving the MCP endpoint and a health check.
 */
export function createStreamableHttpApp(createServer: McpServerFactory) {
  const app = new Hono();

  app.use('*', cors());

  // Uses the factory so each session gets its own Server instance
  const mcpHandler = new MCPStreamableHttpServer(createServer);

  app.get('/health', (c) => {
    return c.json({ status: 'OK', server: SERVER_NAME, version: SERVER_VERSION });
  });

  app.get("/mcp", (c) => mcpHandler.handleGetRequest(c));
  app.post("/mcp", (c) => mcpHandler.handlePostRequest(c));

  return app;
}

/**
 * Sets up a web server for the MCP server using StreamableHTTP transport
 *
 * @param createServer Factory that returns a new MCP Server (one per connection)
 * @param port The port to listen on (default: 3031)
 * @returns The Hono app instance
 */
export async function setupStreamableHttpServer(createServer: McpServerFactory, port = 3031) {
  const app = createStreamableHttpApp(createServer);

  // hostname 0.0.0.0 so it accepts connections from proxy/other hosts
  serve({
    fetch: app.fetch,
    port,
    hostname: '0.0.0.0'
  }, (info) => {
    console.error(`[mcp] StreamableHTTP Server running at http://0.0.0.0:${info.port}`);
    console.error(`- MCP Endpoint: http://<host>:${info.port}/mcp`);
    console.error(`- Health Check: http://<host>:${info.port}/health`);
  });

  return app;
}
