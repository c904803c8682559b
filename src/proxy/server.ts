import express from 'express';
import cors from 'cors';
import type http from 'http';
import type { AddressInfo } from 'net';
import { pipeline } from 'stream/promises';
import { InvalidRequestError, UpstreamError } from '../errors.js';
import { EventReporter } from '../filter/event-reporter.js';
import { processRequest } from '../filter/request-filter.js';
import { FilterLogger } from '../logging/filter-logger.js';
import { UpstreamClient } from '../ollama/upstream-client.js';
import { reporterConfigFrom, type ProxyConfig } from '../config/proxy-config.js';
import { APP_NAME, APP_VERSION } from '../version.js';

export const CHAT_COMPLETIONS_PATH = '/v1/chat/completions';
export const HEALTH_PATH = '/_filter/health';

export interface ProxyServerOptions {
  config: ProxyConfig;
  upstream?: UpstreamClient;
  logger?: FilterLogger;
}

function rawBody(req: express.Request): Buffer {
  return Buffer.isBuffer(req.body) ? req.body : Buffer.alloc(0);
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Forwarding proxy in front of Ollama. Chat completions for allow-listed
 * models get their system prompts filtered; everything else is relayed
 * byte for byte.
 */
export class ProxyServer {
  private app: express.Application;
  private server: http.Server | null = null;
  private config: ProxyConfig;
  private upstream: UpstreamClient;
  private logger: FilterLogger;
  private reporter: EventReporter;
  private allowList: ReadonlySet<string>;

  constructor(options: ProxyServerOptions) {
    this.config = options.config;
    this.upstream = options.upstream ?? new UpstreamClient({
      baseUrl: this.config.upstream.url,
      timeoutMs: this.config.upstream.timeoutMs,
    });
    this.logger = options.logger ?? new FilterLogger({ console: this.config.logging.console });
    this.reporter = new EventReporter(reporterConfigFrom(this.config));
    this.allowList = new Set(this.config.filter.models);

    this.app = express();
    this.setupMiddleware();
    this.setupRoutes();
  }

  getApp(): express.Application {
    return this.app;
  }

  private setupMiddleware() {
    if (this.config.proxy.enableCors) {
      this.app.use(cors({
        methods: ['GET', 'POST', 'OPTIONS'],
        allowedHeaders: ['Content-Type'],
        optionsSuccessStatus: 200,
      }));
    }

    // Bodies stay raw: only chat completions are ever parsed
    this.app.use(express.raw({ type: () => true, limit: this.config.proxy.bodyLimit }));
  }

  private setupRoutes() {
    this.app.get(HEALTH_PATH, async (_req, res) => {
      const upstream = await this.upstream.healthCheck();
      res.status(upstream.reachable ? 200 : 503).json({
        status: upstream.reachable ? 'ok' : 'degraded',
        app: { name: APP_NAME, version: APP_VERSION },
        upstream,
        filterModels: Array.from(this.allowList),
        logging: this.reporter.getConfig(),
      });
    });

    this.app.post(CHAT_COMPLETIONS_PATH, async (req, res) => {
      const body = this.filterBody(rawBody(req));
      await this.relay(req, res, body);
    });

    this.app.all('*', async (req, res) => {
      await this.relay(req, res, rawBody(req));
    });
  }

  /**
   * Returns the body to forward. Filtering is an optimisation, so any body
   * the filter cannot handle is forwarded exactly as received.
   */
  filterBody(body: Buffer): Buffer {
    if (body.length === 0) {
      return body;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(body.toString('utf8'));
    } catch (error) {
      this.logger.warn(`Chat request body is not valid JSON, forwarding unmodified: ${describeError(error)}`);
      return body;
    }

    try {
      const { request, stats } = processRequest(parsed, this.allowList);
      this.logger.emit(this.reporter.render(stats));
      return stats.filtered ? Buffer.from(JSON.stringify(request), 'utf8') : body;
    } catch (error) {
      if (error instanceof InvalidRequestError) {
        this.logger.warn(`${error.message}; forwarding unmodified`, { issues: error.issues });
      } else {
        this.logger.error(`Filtering failed, forwarding unmodified: ${describeError(error)}`);
      }
      return body;
    }
  }

  private async relay(req: express.Request, res: express.Response, body: Buffer): Promise<void> {
    try {
      const upstream = await this.upstream.forward({
        method: req.method,
        path: req.originalUrl,
        headers: req.headers,
        body,
      });

      res.writeHead(upstream.status, upstream.headers);
      this.logger.info(`${req.method} ${req.originalUrl} -> ${upstream.status}`);
      await pipeline(upstream.body, res);
    } catch (error) {
      if (res.headersSent) {
        this.logger.error(`Relay interrupted for ${req.method} ${req.originalUrl}: ${describeError(error)}`);
        res.destroy();
        return;
      }

      const status = error instanceof UpstreamError ? 502 : 500;
      this.logger.error(`${req.method} ${req.originalUrl} failed: ${describeError(error)}`);
      res.status(status).json({ error: describeError(error) });
    }
  }

  start(): Promise<AddressInfo> {
    const { host, port } = this.config.proxy;

    return new Promise((resolve, reject) => {
      const server = this.app.listen(port, host);
      server.once('error', reject);
      server.once('listening', () => {
        const address = server.address();
        if (address === null || typeof address === 'string') {
          reject(new Error(`Unexpected listen address: ${String(address)}`));
          return;
        }
        this.server = server;
        this.logger.info(`Listening on http://${address.address}:${address.port}, forwarding to ${this.upstream.getBaseUrl()}`);
        resolve(address);
      });
    });
  }

  stop(): Promise<void> {
    const server = this.server;
    if (!server) {
      return Promise.resolve();
    }
    this.server = null;

    return new Promise((resolve, reject) => {
      server.close((error) => {
        if (error) {
          reject(error);
          return;
        }
        resolve();
      });
      server.closeAllConnections();
    });
  }
}

export async function startProxyServer(options: ProxyServerOptions): Promise<{ server: ProxyServer; address: AddressInfo }> {
  const server = new ProxyServer(options);
  const address = await server.start();
  return { server, address };
}
