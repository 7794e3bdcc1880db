import http, { type IncomingMessage, type Server, type ServerResponse } from 'http';
import { EventEmitter } from 'events';
import { DEFAULT_MAX_PROJECTED_TRADES } from '@recovery-roadmap/engine';
import type { Logger } from '@recovery-roadmap/shared';
import { buildCorsHeaders } from './cors.js';
import { handleSimulate } from './simulate-handler.js';
import { errorResult, jsonResult, type HttpResult } from './responses.js';
import { DEFAULT_CORS_ORIGINS } from '../config.js';

/** Largest request body accepted, in bytes */
export const MAX_BODY_BYTES = 1024 * 1024;

/**
 * Configuration for ApiServer
 */
export interface ApiServerConfig {
  /** Port to listen on (0 picks a free one) */
  port: number;
  /** Host to bind to */
  host?: string;
  /** Origins allowed to call the API from a browser */
  corsOrigins?: string[];
  /** Largest projection computed per request */
  maxProjectedTrades?: number;
  logger?: Logger;
}

/**
 * Emitted once per answered request
 */
export interface RequestCompletedEvent {
  method: string;
  path: string;
  status: number;
  durationMs: number;
}

type RouteHandler = (req: IncomingMessage) => Promise<HttpResult>;

type BodyReadResult = { ok: true; body: string } | { ok: false; reason: 'too-large' };

/**
 * ApiServer - HTTP server exposing the projection engine
 *
 * Routes:
 *   GET  /              → service banner
 *   GET  /api/health    → liveness
 *   POST /api/simulate  → projection (trades + summary)
 *
 * @example
 * ```typescript
 * const server = new ApiServer({ port: 8000, logger });
 * await server.start();
 * ```
 *
 * @fires request:completed - After each response is written
 */
export class ApiServer extends EventEmitter {
  private config: Required<Omit<ApiServerConfig, 'logger'>>;
  private logger: Logger | undefined;
  private server: Server | null = null;
  private running = false;
  private startedAt = 0;
  private routes: Record<string, Partial<Record<string, RouteHandler>>>;

  constructor(config: ApiServerConfig) {
    super();

    this.config = {
      port: config.port,
      host: config.host || '0.0.0.0',
      corsOrigins: config.corsOrigins ?? DEFAULT_CORS_ORIGINS,
      maxProjectedTrades: config.maxProjectedTrades ?? DEFAULT_MAX_PROJECTED_TRADES,
    };
    this.logger = config.logger;

    this.routes = {
      '/': {
        GET: async () => jsonResult({ message: 'The Recovery Roadmap API' }),
      },
      '/api/health': {
        GET: async () =>
          jsonResult({ status: 'ok', uptime: Math.round((Date.now() - this.startedAt) / 1000) }),
      },
      '/api/simulate': {
        POST: (req) => this.simulate(req),
      },
    };
  }

  /**
   * Start the HTTP server
   */
  async start(): Promise<void> {
    if (this.running) {
      this.logger?.warn('Server already running');
      return;
    }

    const server = http.createServer((req, res) => {
      this.handleRequest(req, res).catch((error: unknown) => {
        this.logger?.error('Request failed after routing', { error: describeError(error) });
        res.destroy();
      });
    });
    this.server = server;

    return new Promise((resolve, reject) => {
      const onError = (error: Error) => {
        this.server = null;
        reject(error);
      };

      server.once('error', onError);
      server.listen(this.config.port, this.config.host, () => {
        server.off('error', onError);
        server.on('error', (error) => {
          this.logger?.error('Server error', { error: describeError(error) });
        });
        this.running = true;
        this.startedAt = Date.now();
        this.logger?.info(`Server listening on ${this.config.host}:${this.getPort()}`);
        resolve();
      });
    });
  }

  /**
   * Stop the HTTP server
   */
  async close(): Promise<void> {
    const server = this.server;
    if (!this.running || !server) {
      return;
    }

    return new Promise((resolve, reject) => {
      server.close((error) => {
        this.running = false;
        this.server = null;
        if (error) {
          reject(error);
          return;
        }
        this.logger?.info('Server closed');
        resolve();
      });
      // Keep-alive sockets would otherwise hold close() open
      server.closeAllConnections();
    });
  }

  isRunning(): boolean {
    return this.running;
  }

  /**
   * Bound port (the real one when started on port 0)
   */
  getPort(): number {
    const address = this.server?.address();
    if (address && typeof address === 'object') {
      return address.port;
    }
    return this.config.port;
  }

  private async handleRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const started = Date.now();
    const method = req.method ?? 'GET';
    const path = requestPath(req.url);
    const preflight = method === 'OPTIONS';

    const corsHeaders = buildCorsHeaders(
      {
        origin: req.headers.origin,
        preflight,
        requestHeaders: req.headers['access-control-request-headers'],
      },
      this.config.corsOrigins
    );

    let result: HttpResult;
    try {
      if (preflight) {
        result = { status: 204 };
      } else if (!path.startsWith('/')) {
        result = errorResult(400, 'BAD_REQUEST', `Malformed request target: ${path}`);
      } else {
        result = await this.route(req, method, path);
      }
    } catch (error) {
      this.logger?.error('Unhandled error while handling request', {
        method,
        path,
        error: describeError(error),
      });
      result = errorResult(500, 'INTERNAL_ERROR', 'Internal server error');
    }

    this.send(res, result, corsHeaders);

    const event: RequestCompletedEvent = {
      method,
      path,
      status: result.status,
      durationMs: Date.now() - started,
    };
    this.logger?.info(`${method} ${path} ${result.status}`, { durationMs: event.durationMs });
    this.emit('request:completed', event);
  }

  private async route(req: IncomingMessage, method: string, path: string): Promise<HttpResult> {
    const handlers = this.routes[path];
    if (!handlers) {
      return errorResult(404, 'NOT_FOUND', `No route for ${path}`);
    }

    const handler = handlers[method];
    if (!handler) {
      const result = errorResult(405, 'METHOD_NOT_ALLOWED', `${method} is not allowed on ${path}`);
      // Preflight is answered on every route
      result.headers = { Allow: [...Object.keys(handlers), 'OPTIONS'].join(', ') };
      return result;
    }

    return handler(req);
  }

  private async simulate(req: IncomingMessage): Promise<HttpResult> {
    const read = await readBody(req, MAX_BODY_BYTES);
    if (!read.ok) {
      return errorResult(413, 'PAYLOAD_TOO_LARGE', `Request body exceeds ${MAX_BODY_BYTES} bytes`);
    }

    // An empty body means "use every default"
    let payload: unknown = {};
    if (read.body.trim().length > 0) {
      try {
        payload = JSON.parse(read.body);
      } catch (error) {
        return errorResult(400, 'INVALID_JSON', `Request body is not valid JSON: ${describeError(error)}`);
      }
    }

    return handleSimulate(payload, {
      maxProjectedTrades: this.config.maxProjectedTrades,
      logger: this.logger,
    });
  }

  private send(res: ServerResponse, result: HttpResult, corsHeaders: Record<string, string>): void {
    const headers: Record<string, string> = { ...corsHeaders, ...result.headers };

    if (result.body === undefined) {
      res.writeHead(result.status, headers);
      res.end();
      return;
    }

    const payload = JSON.stringify(result.body);
    res.writeHead(result.status, {
      ...headers,
      'Content-Type': 'application/json; charset=utf-8',
      'Content-Length': String(Buffer.byteLength(payload)),
    });
    res.end(payload);
  }
}

/**
 * Request target without its query string, taken verbatim (no host parsing)
 */
function requestPath(url: string | undefined): string {
  const target = url ?? '/';
  const queryStart = target.indexOf('?');
  return queryStart === -1 ? target : target.slice(0, queryStart);
}

/**
 * Collect a request body, giving up (but still draining) past `limit` bytes
 */
function readBody(req: IncomingMessage, limit: number): Promise<BodyReadResult> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;
    let tooLarge = false;

    req.on('data', (chunk: Buffer) => {
      size += chunk.length;
      if (size > limit) {
        tooLarge = true;
        chunks.length = 0;
        return;
      }
      if (!tooLarge) {
        chunks.push(chunk);
      }
    });
    req.on('end', () => {
      resolve(tooLarge ? { ok: false, reason: 'too-large' } : { ok: true, body: Buffer.concat(chunks).toString('utf8') });
    });
    req.on('error', reject);
  });
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
