/**
 * @fileoverview RPC HTTP Server
 *
 * Plain node:http transport:
 * - POST /rpc    JSON RpcRequest in, JSON RpcResponse out
 * - GET  /rpc    registered methods with descriptions
 * - GET  /health liveness and uptime
 */
import * as http from 'http';
import type { AddressInfo } from 'net';
import { z } from 'zod';
import {
  createLogger,
  ErrorCode,
  MethodRegistry,
  toErrorMessage,
  VERSION,
  type RpcContext,
  type RpcRequest,
} from '@querytrail/core';

const logger = createLogger('http');

/** Request bodies above this size are rejected with 413 */
export const MAX_BODY_BYTES = 1024 * 1024;

// =============================================================================
// Types
// =============================================================================

export interface RpcHttpServerConfig {
  port: number;
  host?: string;
}

export interface HealthResponse {
  status: 'healthy';
  version: string;
  uptime: number;
  timestamp: string;
}

const rpcRequestSchema = z.object({
  id: z.union([z.string(), z.number()]),
  method: z.string().min(1),
  params: z.unknown().optional(),
});

class BodyTooLargeError extends Error {}

// =============================================================================
// Server
// =============================================================================

export class RpcHttpServer {
  private server: http.Server | null = null;
  private readonly startedAt = Date.now();

  constructor(
    private readonly config: RpcHttpServerConfig,
    private readonly registry: MethodRegistry,
    private readonly context: RpcContext
  ) {}

  async start(): Promise<void> {
    return new Promise((resolve, reject) => {
      const server = http.createServer((req, res) => {
        this.handleRequest(req, res).catch((error: unknown) => {
          logger.error('Request handling failed', error instanceof Error ? error : { error: String(error) });
          if (!res.headersSent) {
            this.sendJson(res, 500, { error: 'Internal server error' });
          } else {
            res.end();
          }
        });
      });

      server.once('error', (error) => {
        logger.error('HTTP server error', error);
        reject(error);
      });

      server.listen(this.config.port, this.config.host ?? '127.0.0.1', () => {
        this.server = server;
        logger.info('HTTP server started', { port: this.getPort(), host: this.config.host ?? '127.0.0.1' });
        resolve();
      });
    });
  }

  async stop(): Promise<void> {
    return new Promise((resolve, reject) => {
      if (!this.server) {
        resolve();
        return;
      }
      const server = this.server;
      server.close((error) => {
        this.server = null;
        if (error) {
          reject(error);
        } else {
          resolve();
        }
      });
      server.closeIdleConnections();
    });
  }

  /**
   * Bound port; null before start
   */
  getPort(): number | null {
    const address = this.server?.address();
    return isAddressInfo(address) ? address.port : null;
  }

  // ===========================================================================
  // Private Methods
  // ===========================================================================

  private async handleRequest(req: http.IncomingMessage, res: http.ServerResponse): Promise<void> {
    res.setHeader('Access-Control-Allow-Origin', '*');
    res.setHeader('Access-Control-Allow-Methods', 'GET, POST, OPTIONS');
    res.setHeader('Access-Control-Allow-Headers', 'Content-Type');

    if (req.method === 'OPTIONS') {
      res.writeHead(204);
      res.end();
      return;
    }

    const url = new URL(req.url ?? '/', 'http://localhost');

    if (url.pathname === '/health' && req.method === 'GET') {
      this.sendJson(res, 200, this.getHealthResponse());
      return;
    }
    if (url.pathname === '/rpc') {
      if (req.method === 'GET') {
        this.sendJson(res, 200, { methods: this.registry.describeAll() });
        return;
      }
      if (req.method !== 'POST') {
        this.sendJson(res, 405, { error: 'Method not allowed' });
        return;
      }
      await this.handleRpc(req, res);
      return;
    }

    this.sendJson(res, 404, { error: 'Not found' });
  }

  private async handleRpc(req: http.IncomingMessage, res: http.ServerResponse): Promise<void> {
    let body: string;
    try {
      body = await readBody(req, MAX_BODY_BYTES);
    } catch (error) {
      if (error instanceof BodyTooLargeError) {
        this.sendJson(res, 413, MethodRegistry.errorResponse('', ErrorCode.INVALID_PARAMS, 'Request body too large'));
        return;
      }
      throw error;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(body);
    } catch (error) {
      this.sendJson(
        res,
        400,
        MethodRegistry.errorResponse('', ErrorCode.INVALID_PARAMS, `Malformed JSON: ${toErrorMessage(error)}`)
      );
      return;
    }

    const parsed = rpcRequestSchema.safeParse(raw);
    if (!parsed.success) {
      this.sendJson(
        res,
        400,
        MethodRegistry.errorResponse('', ErrorCode.INVALID_PARAMS, 'Request must have an id and a method')
      );
      return;
    }

    const request: RpcRequest = parsed.data;
    const response = await this.registry.dispatch(request, this.context);
    this.sendJson(res, 200, response);
  }

  private getHealthResponse(): HealthResponse {
    return {
      status: 'healthy',
      version: VERSION,
      uptime: Math.floor((Date.now() - this.startedAt) / 1000),
      timestamp: new Date().toISOString(),
    };
  }

  private sendJson(res: http.ServerResponse, status: number, payload: unknown): void {
    res.writeHead(status, { 'Content-Type': 'application/json' });
    res.end(JSON.stringify(payload));
  }
}

function isAddressInfo(value: string | AddressInfo | null | undefined): value is AddressInfo {
  return typeof value === 'object' && value !== null;
}

function readBody(req: http.IncomingMessage, limit: number): Promise<string> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;
    req.on('data', (chunk: Buffer) => {
      size += chunk.length;
      if (size > limit) {
        reject(new BodyTooLargeError(`body exceeds ${limit} bytes`));
        req.resume();
        return;
      }
      chunks.push(chunk);
    });
    req.on('end', () => resolve(Buffer.concat(chunks).toString('utf-8')));
    req.on('error', reject);
  });
}
