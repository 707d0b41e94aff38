/**
 * Webhook HTTP Server — accepts JSON events and serves the exposition endpoint.
 * Uses Node.js built-in http module (no Express).
 */

import { createServer, type Server, type IncomingMessage, type ServerResponse } from 'node:http';
import type { Socket } from 'node:net';
import type { EngineError, JsonObject, JsonValue, Result } from '../core/types.js';
import { err, ok } from '../core/types.js';
import { describeError } from '../core/errors.js';
import type { MetricEngine } from '../core/engine.js';
import { createLogger, type Logger } from '../core/logger.js';

export interface WebhookServerConfig {
  host: string;
  port: number;
  /** Normalised: leading slash, no trailing slash, or empty */
  webhookBasepath: string;
  /** Serve GET /metrics */
  scrapeable: boolean;
}

/** Maximum request body size in bytes (1 MB) */
const MAX_BODY_BYTES = 1_048_576;

/** Request timeout in milliseconds (30s) */
const REQUEST_TIMEOUT_MS = 30_000;

const WEBHOOK_METHODS = ['POST', 'PUT', 'DELETE'];

export function statusFor(error: EngineError): number {
  switch (error.type) {
    case 'rule_not_found':
    case 'key_not_found':
      return 404;
    case 'value_parse_error':
    case 'invalid_labels':
    case 'invalid_increment':
      return 422;
    case 'unsupported_kind':
    case 'invalid_metric_name':
      return 400;
    case 'label_set_conflict':
    case 'metric_name_conflict':
      return 409;
  }
}

/**
 * HTTP front end for a MetricEngine.
 */
export class WebhookHttpServer {
  private server: Server | null = null;
  private startedAt = 0;
  private connections = new Set<Socket>();
  private logger: Logger;

  constructor(
    private config: WebhookServerConfig,
    private engine: MetricEngine,
    logger?: Logger,
  ) {
    this.logger = logger ?? createLogger('WebhookHttpServer');
  }

  async start(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.server = createServer((req, res) => {
        this.handleRequest(req, res).catch((error: unknown) => {
          this.logger.error('Unhandled request failure', {
            error: error instanceof Error ? error.message : String(error),
          });
          if (!res.headersSent) this.sendJson(res, 500, { error: 'Internal server error' });
          else res.destroy();
        });
      });
      this.server.on('connection', (socket) => {
        this.connections.add(socket);
        socket.on('close', () => this.connections.delete(socket));
      });
      this.server.listen(this.config.port, this.config.host, () => {
        this.startedAt = Date.now();
        this.logger.info('Server started', {
          port: this.port,
          host: this.config.host,
          webhookBasepath: this.config.webhookBasepath,
        });
        resolve();
      });
      this.server.on('error', reject);
    });
  }

  async stop(): Promise<void> {
    this.logger.info('Server stopping');

    for (const socket of this.connections) {
      socket.destroy();
    }
    this.connections.clear();

    return new Promise((resolve) => {
      if (!this.server) { resolve(); return; }
      this.server.close(() => resolve());
      this.server = null;
    });
  }

  /** The actual port after listen (useful when port=0) */
  get port(): number {
    const addr = this.server?.address();
    if (addr && typeof addr === 'object') return addr.port;
    return this.config.port;
  }

  // ── Request Router ──

  private async handleRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const url = new URL(req.url ?? '/', `http://${req.headers.host ?? 'localhost'}`);
    const path = url.pathname;
    const method = req.method ?? 'GET';

    try {
      if (method === 'GET' && path === '/metrics' && this.config.scrapeable) {
        return await this.handleMetrics(res);
      }
      if (method === 'GET' && path === '/health') {
        return this.handleHealth(res);
      }
      if (method === 'GET' && path === '/') {
        return this.handleIndex(res);
      }

      const event = this.eventFromPath(path);
      if (event === undefined) {
        this.sendJson(res, 404, { error: 'Not found' });
        return;
      }
      if (!WEBHOOK_METHODS.includes(method)) {
        res.setHeader('Allow', WEBHOOK_METHODS.join(', '));
        this.sendJson(res, 405, { error: `Method ${method} not allowed` });
        return;
      }
      if (event === '') {
        this.sendJson(res, 400, { error: 'Invalid event name in path' });
        return;
      }
      if (method === 'DELETE') {
        return this.handleDelete(event, res);
      }
      return await this.handleEvent(req, res, url, event);
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Internal server error';
      this.logger.error('Request error', { method, path, error: message });
      this.sendJson(res, 500, { error: message });
    }
  }

  // ── Route Handlers ──

  private async handleMetrics(res: ServerResponse): Promise<void> {
    const body = await this.engine.render();
    res.writeHead(200, { 'Content-Type': this.engine.contentType });
    res.end(body);
  }

  private handleHealth(res: ServerResponse): void {
    this.sendJson(res, 200, {
      status: 'ok',
      uptime: Date.now() - this.startedAt,
      metrics: this.engine.enumerateActiveMetrics().length,
    });
  }

  private handleIndex(res: ServerResponse): void {
    this.sendJson(res, 200, {
      webhook_basepath: this.config.webhookBasepath,
      configured_events: this.engine.configuredPatterns(),
      scrapeable: this.config.scrapeable,
    });
  }

  private async handleEvent(req: IncomingMessage, res: ServerResponse, url: URL, event: string): Promise<void> {
    const contentType = req.headers['content-type'] ?? '';
    if (!contentType.includes('application/json')) {
      this.sendJson(res, 415, { error: 'Content-Type must be application/json' });
      return;
    }

    const body = await this.readBody(req);
    if (!body.ok) {
      this.sendJson(res, 400, { error: body.error });
      return;
    }

    const envelope: JsonObject = {
      data: body.value,
      req: {
        method: req.method ?? 'POST',
        path: url.pathname,
        event,
        query: Object.fromEntries(url.searchParams),
        headers: headersOf(req),
      },
    };

    const result = this.engine.processEvent(event, envelope);
    if (!result.ok) {
      this.sendError(res, result.error);
      return;
    }
    this.sendJson(res, 200, { updated_metric: event });
  }

  private handleDelete(event: string, res: ServerResponse): void {
    const result = this.engine.deleteMetric(event);
    if (!result.ok) {
      this.sendError(res, result.error);
      return;
    }
    this.sendJson(res, 202, { removed_metric: result.value.removed });
  }

  // ── Helpers ──

  /**
   * Event name for a path under the webhook base path: '' when the segment is
   * missing or malformed, undefined when the path is not a webhook route.
   */
  private eventFromPath(path: string): string | undefined {
    const prefix = `${this.config.webhookBasepath}/`;
    if (!path.startsWith(prefix)) return undefined;
    const segment = path.slice(prefix.length);
    if (segment.includes('/')) return undefined;
    try {
      return decodeURIComponent(segment);
    } catch {
      return '';
    }
  }

  private sendError(res: ServerResponse, error: EngineError): void {
    const body: Record<string, unknown> = { error: describeError(error), ...error };
    if (error.type === 'rule_not_found') {
      body.webhook_basepath = this.config.webhookBasepath;
      body.configured_events = error.configuredPatterns;
    }
    this.sendJson(res, statusFor(error), body);
  }

  private sendJson(res: ServerResponse, status: number, body: unknown): void {
    res.writeHead(status, { 'Content-Type': 'application/json' });
    res.end(JSON.stringify(body));
  }

  private readBody(req: IncomingMessage): Promise<Result<JsonValue, string>> {
    return new Promise((resolve) => {
      const chunks: Buffer[] = [];
      let size = 0;
      const timeout = setTimeout(() => {
        req.destroy();
        resolve(err('Request body timed out'));
      }, REQUEST_TIMEOUT_MS);

      req.on('data', (chunk: Buffer) => {
        size += chunk.length;
        // Past the limit the rest is drained and dropped so a response can still be sent.
        if (size <= MAX_BODY_BYTES) chunks.push(chunk);
      });
      req.on('end', () => {
        clearTimeout(timeout);
        if (size > MAX_BODY_BYTES) {
          resolve(err('Request body too large'));
          return;
        }
        try {
          const parsed: JsonValue = JSON.parse(Buffer.concat(chunks).toString('utf-8'));
          resolve(ok(parsed));
        } catch {
          resolve(err('Invalid JSON body'));
        }
      });
      req.on('error', (error) => {
        clearTimeout(timeout);
        resolve(err(`Request body unreadable: ${error.message}`));
      });
    });
  }
}

function headersOf(req: IncomingMessage): JsonObject {
  const headers: JsonObject = {};
  for (const [name, value] of Object.entries(req.headers)) {
    if (value !== undefined) headers[name] = value;
  }
  return headers;
}
