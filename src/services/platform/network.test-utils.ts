/**
 * Test utilities for the network layer.
 *
 * - createMockHttpClient: in-memory HttpClient with per-URL responses
 * - createTestServer: real HTTP server on 127.0.0.1 for boundary tests
 */

import {
  createServer as createHttpServer,
  type Server,
  type IncomingMessage,
  type ServerResponse,
} from "node:http";
import type { HttpClient, HttpRequestOptions } from "./network";

// ============================================================================
// Mock Http Client
// ============================================================================

/** Record of an HTTP request made through the mock. */
export interface HttpRequestRecord {
  readonly url: string;
  readonly options: HttpRequestOptions | undefined;
}

/**
 * Response configuration. A fresh Response is built on each fetch() call.
 */
export interface ConfiguredResponse {
  /** Body sent as a single chunk, or as the given chunks in order */
  readonly body?: string | Uint8Array | readonly Uint8Array[];
  readonly status?: number; // Default: 200
  readonly headers?: Record<string, string>;
  /** Reject fetch() with this error instead of responding */
  readonly error?: Error;
  /** Send Content-Length matching the body. Default: true */
  readonly contentLength?: boolean;
}

export interface MockHttpClient extends HttpClient {
  readonly requests: readonly HttpRequestRecord[];
  setResponse(url: string, config: ConfiguredResponse): void;
}

export interface MockHttpClientOptions {
  /** Pre-configured responses by exact URL. */
  responses?: Record<string, ConfiguredResponse>;
  /** Used for unconfigured URLs. Default: { status: 404 } */
  defaultResponse?: ConfiguredResponse;
}

function toChunks(body: ConfiguredResponse["body"]): Uint8Array[] {
  if (body === undefined) return [];
  if (typeof body === "string") return [new TextEncoder().encode(body)];
  if (body instanceof Uint8Array) return [body];
  return [...body];
}

function abortError(): DOMException {
  return new DOMException("The operation was aborted.", "AbortError");
}

/**
 * Create an in-memory HttpClient.
 *
 * @example
 * const httpClient = createMockHttpClient({
 *   responses: {
 *     "https://example.test/tool.zip": { body: zipBytes },
 *   },
 * });
 */
export function createMockHttpClient(options?: MockHttpClientOptions): MockHttpClient {
  const requests: HttpRequestRecord[] = [];
  const responses = new Map<string, ConfiguredResponse>(
    options?.responses ? Object.entries(options.responses) : []
  );
  const defaultResponse: ConfiguredResponse = options?.defaultResponse ?? { status: 404 };

  return {
    get requests(): readonly HttpRequestRecord[] {
      return requests;
    },

    setResponse(url: string, config: ConfiguredResponse): void {
      responses.set(url, config);
    },

    async fetch(url: string, opts?: HttpRequestOptions): Promise<Response> {
      requests.push({ url, options: opts });
      if (opts?.signal?.aborted) {
        throw abortError();
      }

      const config = responses.get(url) ?? defaultResponse;
      if (config.error) {
        throw config.error;
      }

      const chunks = toChunks(config.body);
      const total = chunks.reduce((sum, chunk) => sum + chunk.byteLength, 0);
      const headers = new Headers(config.headers);
      if (config.contentLength !== false && !headers.has("content-length")) {
        headers.set("content-length", String(total));
      }

      let index = 0;
      const stream = new ReadableStream<Uint8Array>({
        pull(controller) {
          const chunk = chunks[index];
          index++;
          if (chunk === undefined) {
            controller.close();
          } else {
            controller.enqueue(chunk);
          }
        },
      });

      return new Response(stream, { status: config.status ?? 200, headers });
    },
  };
}

// ============================================================================
// Test Server for Boundary Tests
// ============================================================================

/**
 * Route handler for test server.
 */
export type RouteHandler = (req: IncomingMessage, res: ServerResponse) => void;

/**
 * Test HTTP server for boundary tests.
 */
export interface TestServer {
  /** Get the port the server is listening on. Throws if not started. */
  getPort(): number;
  /** Start the server. Resolves when listening. */
  start(): Promise<void>;
  /** Stop the server. Resolves when closed. Safe to call multiple times. */
  stop(): Promise<void>;
  /** Build URL for a given path. */
  url(path: string): string;
}

/**
 * Create a test HTTP server for boundary tests.
 *
 * Default routes:
 * - GET /json → 200, {"status": "ok"}
 * - GET /echo-headers → 200, request headers as JSON
 * - GET /stall → headers and a first chunk, then nothing
 * - GET /error/404 → 404 Not Found
 * - GET /error/500 → 500 Internal Server Error
 *
 * @example
 * const server = createTestServer({
 *   "/tool.gz": (_req, res) => {
 *     res.writeHead(200);
 *     res.end(gzipped);
 *   },
 * });
 * await server.start();
 * const response = await fetch(server.url("/tool.gz"));
 * await server.stop();
 */
export function createTestServer(routes?: Record<string, RouteHandler>): TestServer {
  let serverPort: number | null = null;
  let server: Server | null = null;

  const defaultRoutes: Record<string, RouteHandler> = {
    "/json": (_req, res) => {
      res.writeHead(200, { "Content-Type": "application/json" });
      res.end(JSON.stringify({ status: "ok" }));
    },
    "/echo-headers": (req, res) => {
      res.writeHead(200, { "Content-Type": "application/json" });
      res.end(JSON.stringify(req.headers));
    },
    "/stall": (_req, res) => {
      res.writeHead(200, { "Content-Type": "application/octet-stream", "Content-Length": "1024" });
      res.write(Buffer.alloc(16, 1));
    },
    "/error/404": (_req, res) => {
      res.writeHead(404, { "Content-Type": "application/json" });
      res.end(JSON.stringify({ message: "Not Found" }));
    },
    "/error/500": (_req, res) => {
      res.writeHead(500, { "Content-Type": "application/json" });
      res.end(JSON.stringify({ message: "Internal Server Error" }));
    },
  };

  const allRoutes = { ...defaultRoutes, ...routes };

  return {
    getPort(): number {
      if (serverPort === null) {
        throw new Error("Server not started - call start() first");
      }
      return serverPort;
    },

    async start(): Promise<void> {
      if (server) return;

      const created = createHttpServer((req, res) => {
        const handler = allRoutes[req.url ?? ""];
        if (handler) {
          handler(req, res);
        } else {
          res.writeHead(404);
          res.end();
        }
      });
      server = created;

      await new Promise<void>((resolve, reject) => {
        // Bind to 127.0.0.1 only (avoid IPv4/IPv6 resolution issues)
        created.listen(0, "127.0.0.1", () => {
          const addr = created.address();
          if (addr && typeof addr === "object") {
            serverPort = addr.port;
            resolve();
          } else {
            reject(new Error("Failed to get server address"));
          }
        });
        created.on("error", reject);
      });
    },

    async stop(): Promise<void> {
      const running = server;
      if (!running || serverPort === null) {
        return;
      }

      // Stalled responses keep sockets open; close() alone would wait for them.
      running.closeAllConnections();
      await new Promise<void>((resolve) => {
        running.close(() => {
          serverPort = null;
          server = null;
          resolve();
        });
      });
    },

    url(path: string): string {
      if (serverPort === null) {
        throw new Error("Server not started - call start() first");
      }
      return `http://127.0.0.1:${serverPort}${path}`;
    },
  };
}
