/**
 * Food Gap HTTP API
 *
 * Routes:
 * - GET /               service banner
 * - GET /api/food-gaps  latest-year supply gaps as a GeoJSON FeatureCollection
 *
 * CORS admits exactly one origin, with credentials. Preflight requests from
 * any other origin are rejected with 400; simple requests from other origins
 * are served without CORS headers, so the browser withholds the response.
 */

import { createServer, type IncomingMessage, type Server, type ServerResponse } from 'node:http';
import type { AddressInfo } from 'node:net';
import { createLogger, errorMetadata } from '../core/utils/logger.js';
import { FoodGapService } from './food-gap-service.js';

const logger = createLogger({ module: 'api' });

export const API_TITLE = 'NYC Food Gap Visualization API';

const PREFLIGHT_ALLOW_METHODS = 'DELETE, GET, HEAD, OPTIONS, PATCH, POST, PUT';
const PREFLIGHT_MAX_AGE = '600';

export interface FoodGapAPIOptions {
  readonly port?: number;
  readonly host?: string;
  /** The one origin allowed to call the API from a browser */
  readonly corsOrigin?: string;
}

type RouteHandler = (res: ServerResponse) => Promise<void>;

interface Route {
  readonly method: string;
  readonly handler: RouteHandler;
}

export class FoodGapAPI {
  private readonly server: Server;
  private readonly routes: ReadonlyMap<string, Route>;
  private readonly port: number;
  private readonly host: string;
  private readonly corsOrigin: string;

  constructor(
    private readonly foodGapService: FoodGapService = new FoodGapService(),
    options: FoodGapAPIOptions = {}
  ) {
    this.port = options.port ?? 8000;
    this.host = options.host ?? '0.0.0.0';
    this.corsOrigin = options.corsOrigin ?? 'http://localhost:5173';

    this.routes = new Map<string, Route>([
      ['/', { method: 'GET', handler: async (res) => this.handleRoot(res) }],
      ['/api/food-gaps', { method: 'GET', handler: async (res) => this.handleFoodGaps(res) }],
    ]);

    this.server = createServer((req, res) => {
      this.handleRequest(req, res).catch((error: unknown) => {
        logger.error('Unhandled API error', errorMetadata(error));
        if (!res.headersSent) {
          this.sendJSON(res, 500, { detail: 'Internal Server Error' });
        } else {
          res.end();
        }
      });
    });
  }

  /**
   * Start HTTP server; resolves once listening
   */
  async start(): Promise<void> {
    await new Promise<void>((resolve, reject) => {
      this.server.once('error', reject);
      this.server.listen(this.port, this.host, () => {
        this.server.off('error', reject);
        resolve();
      });
    });
    logger.info('Food gap API server started', {
      host: this.host,
      port: this.listeningPort(),
      corsOrigin: this.corsOrigin,
      endpoints: ['GET /', 'GET /api/food-gaps'],
    });
  }

  /**
   * Stop HTTP server
   */
  async stop(): Promise<void> {
    if (!this.server.listening) {
      return;
    }
    await new Promise<void>((resolve, reject) => {
      this.server.close((error) => (error ? reject(error) : resolve()));
    });
    logger.info('API server stopped');
  }

  /** Bound port, or the configured one before `start()` */
  listeningPort(): number {
    const address: AddressInfo | string | null = this.server.address();
    return address !== null && typeof address === 'object' ? address.port : this.port;
  }

  /**
   * Handle incoming HTTP request
   */
  async handleRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const origin = req.headers.origin;
    const method = req.method ?? 'GET';

    if (method === 'OPTIONS' && origin !== undefined && req.headers['access-control-request-method'] !== undefined) {
      this.handlePreflight(req, res, origin);
      return;
    }

    if (origin !== undefined && origin === this.corsOrigin) {
      this.setCORSHeaders(res, origin);
    }

    const pathname = new URL(req.url ?? '/', 'http://localhost').pathname;
    const route = this.routes.get(pathname);

    if (!route) {
      this.sendJSON(res, 404, { detail: 'Not Found' });
      return;
    }
    if (route.method !== method) {
      res.setHeader('Allow', route.method);
      this.sendJSON(res, 405, { detail: 'Method Not Allowed' });
      return;
    }

    await route.handler(res);
  }

  private async handleRoot(res: ServerResponse): Promise<void> {
    this.sendJSON(res, 200, { message: API_TITLE });
  }

  private async handleFoodGaps(res: ServerResponse): Promise<void> {
    try {
      const collection = await this.foodGapService.getFoodGaps();
      this.sendJSON(res, 200, collection);
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      this.sendJSON(res, 500, { detail });
    }
  }

  private handlePreflight(req: IncomingMessage, res: ServerResponse, origin: string): void {
    if (origin !== this.corsOrigin) {
      res.writeHead(400, { 'Content-Type': 'text/plain; charset=utf-8' });
      res.end('Disallowed CORS origin');
      return;
    }

    this.setCORSHeaders(res, origin);
    res.setHeader('Access-Control-Allow-Methods', PREFLIGHT_ALLOW_METHODS);
    res.setHeader('Access-Control-Max-Age', PREFLIGHT_MAX_AGE);
    const requestedHeaders = req.headers['access-control-request-headers'];
    if (typeof requestedHeaders === 'string' && requestedHeaders !== '') {
      res.setHeader('Access-Control-Allow-Headers', requestedHeaders);
    }
    res.writeHead(200, { 'Content-Type': 'text/plain; charset=utf-8' });
    res.end('OK');
  }

  private setCORSHeaders(res: ServerResponse, origin: string): void {
    res.setHeader('Access-Control-Allow-Origin', origin);
    res.setHeader('Access-Control-Allow-Credentials', 'true');
    res.setHeader('Vary', 'Origin');
  }

  private sendJSON(res: ServerResponse, status: number, body: unknown): void {
    res.writeHead(status, { 'Content-Type': 'application/json' });
    res.end(JSON.stringify(body));
  }
}
