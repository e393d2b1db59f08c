/**
 * HTTP Listener - Express ingress for inbound agent messages
 */

import { createServer, type Server } from 'node:http';
import express, { raw, type ErrorRequestHandler, type Express, type Request, type Response } from 'express';
import {
  TransportSetupError,
  type InboundRequestHandler,
  type InboundTransport,
  type ListenerCallbacks,
  type ListenerInfo,
} from '@walletgate/core';
import { encodePayload, readInboundBody } from './content.js';

export const INVITATION_TEXT =
  'You have received a connection invitation. To accept the '
  + 'invitation, paste it into your agent application.';

/** Body of every 500; the cause is only logged */
export const INTERNAL_ERROR_TEXT = 'Internal server error';

/** Request body limit when none is configured */
export const DEFAULT_MAX_MESSAGE_SIZE = 1024 * 1024;

export interface HttpListenerConfig {
  port: number;
  host?: string;
  /** Largest accepted body in bytes */
  maxMessageSize?: number;
  /** Overrides the service's direct-response timeout */
  responseTimeoutMs?: number;
}

export class HttpListener implements InboundTransport {
  readonly type = 'http';

  private config: HttpListenerConfig;
  private server: Server | null = null;
  private callbacks: ListenerCallbacks | null = null;
  private listenerInfo: ListenerInfo | null = null;

  constructor(config: HttpListenerConfig) {
    this.config = config;
  }

  get info(): ListenerInfo | null {
    return this.listenerInfo;
  }

  createApp(handler: InboundRequestHandler): Express {
    const app = express();
    app.disable('x-powered-by');

    app.get('/', (req, res) => this.handleInvite(req, res));

    app.post(
      '/',
      raw({ type: () => true, limit: this.config.maxMessageSize ?? DEFAULT_MAX_MESSAGE_SIZE }),
      (req, res, next) => {
        this.handleInbound(handler, req, res).catch(next);
      },
    );

    app.use(errorHandler);
    return app;
  }

  async start(handler: InboundRequestHandler, callbacks?: ListenerCallbacks): Promise<ListenerInfo> {
    if (this.server) {
      throw new Error('HttpListener already started');
    }

    const host = this.config.host ?? '0.0.0.0';
    const server = createServer(this.createApp(handler));

    try {
      await new Promise<void>((resolve, reject) => {
        server.once('error', reject);
        server.listen(this.config.port, host, () => {
          server.off('error', reject);
          resolve();
        });
      });
    } catch (error) {
      throw new TransportSetupError(
        `Unable to start webserver with host '${host}' and port '${this.config.port}'`,
        error instanceof Error ? error.message : undefined,
      );
    }

    server.on('error', (error) => {
      console.error('[WalletGate:Http] Server error:', error);
      this.callbacks?.onError?.(error);
    });

    const address = server.address();
    const port = typeof address === 'object' && address ? address.port : this.config.port;
    const info: ListenerInfo = { type: this.type, host, port, url: `http://${host}:${port}` };

    this.server = server;
    this.callbacks = callbacks ?? null;
    this.listenerInfo = info;

    console.log(`[WalletGate:Http] Listening on ${info.url}`);
    callbacks?.onStarted?.(info);
    return info;
  }

  async stop(): Promise<void> {
    const server = this.server;
    if (!server) return;

    this.server = null;
    this.listenerInfo = null;

    await new Promise<void>((resolve, reject) => {
      server.close((err) => {
        if (err) reject(err);
        else resolve();
      });
      server.closeAllConnections();
    });

    console.log('[WalletGate:Http] Stopped');
    this.callbacks?.onStopped?.(this.type);
    this.callbacks = null;
  }

  private handleInvite(req: Request, res: Response): void {
    if (req.query['c_i']) {
      res.status(200).type('text/plain').send(INVITATION_TEXT);
      return;
    }
    res.status(200).end();
  }

  private async handleInbound(handler: InboundRequestHandler, req: Request, res: Response): Promise<void> {
    const rawBody: Buffer = Buffer.isBuffer(req.body) ? req.body : Buffer.alloc(0);
    const body = readInboundBody(req.headers['content-type'], rawBody);

    const controller = new AbortController();
    res.on('close', () => {
      if (!res.writableFinished) controller.abort();
    });

    const result = await handler.handleInbound({
      body,
      peer: { host: req.get('host'), remote: req.socket.remoteAddress },
      signal: controller.signal,
      responseTimeoutMs: this.config.responseTimeoutMs,
    });

    if (controller.signal.aborted) {
      return;
    }

    switch (result.outcome) {
      case 'responded': {
        const encoded = encodePayload(result.payload);
        res.status(200).set('Content-Type', encoded.contentType).send(encoded.body);
        return;
      }
      case 'accepted':
        res.status(200).end();
        return;
      case 'rejected':
        res.status(400).json({ error: result.error.message });
        return;
      case 'failed':
        res.status(500).json({ error: INTERNAL_ERROR_TEXT });
        return;
    }
  }
}

function statusOf(error: unknown): number {
  if (typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number') {
    return error.status;
  }
  return 500;
}

const errorHandler: ErrorRequestHandler = (error: unknown, _req, res, _next) => {
  const status = statusOf(error);
  if (status >= 500) {
    console.error('[WalletGate:Http] Error handling request:', error);
  } else {
    console.warn(`[WalletGate:Http] Request refused (${status}):`, error instanceof Error ? error.message : error);
  }
  if (res.headersSent) return;
  res.status(status).json({
    error: status < 500 && error instanceof Error ? error.message : INTERNAL_ERROR_TEXT,
  });
};
