/**
 * WebSocket Listener - each inbound frame is one exchange; direct responses
 * go back on the same socket.
 */

import type { IncomingMessage } from 'node:http';
import type { RawData } from 'ws';
import WebSocket, { WebSocketServer } from 'ws';
import {
  TransportSetupError,
  generateSocketId,
  isBinaryPayload,
  type InboundBody,
  type InboundRequestHandler,
  type InboundTransport,
  type ListenerCallbacks,
  type ListenerInfo,
  type PeerInfo,
} from '@walletgate/core';
import { DEFAULT_MAX_MESSAGE_SIZE } from './http-listener.js';

export interface WebSocketListenerConfig {
  port: number;
  host?: string;
  maxMessageSize?: number;
  responseTimeoutMs?: number;
}

interface OpenSocket {
  socket: WebSocket;
  peer: PeerInfo;
  /** Aborts the socket's in-flight exchanges */
  exchanges: Set<AbortController>;
}

export class WebSocketListener implements InboundTransport {
  readonly type = 'ws';

  private config: WebSocketListenerConfig;
  private wss: WebSocketServer | null = null;
  private sockets = new Map<string, OpenSocket>();
  private callbacks: ListenerCallbacks | null = null;
  private listenerInfo: ListenerInfo | null = null;

  constructor(config: WebSocketListenerConfig) {
    this.config = config;
  }

  get info(): ListenerInfo | null {
    return this.listenerInfo;
  }

  get connectionCount(): number {
    return this.sockets.size;
  }

  async start(handler: InboundRequestHandler, callbacks?: ListenerCallbacks): Promise<ListenerInfo> {
    if (this.wss) {
      throw new Error('WebSocketListener already started');
    }

    const host = this.config.host ?? '0.0.0.0';
    const wss = new WebSocketServer({
      host,
      port: this.config.port,
      maxPayload: this.config.maxMessageSize ?? DEFAULT_MAX_MESSAGE_SIZE,
    });

    try {
      await new Promise<void>((resolve, reject) => {
        wss.once('error', reject);
        wss.once('listening', () => {
          wss.off('error', reject);
          resolve();
        });
      });
    } catch (error) {
      wss.close();
      throw new TransportSetupError(
        `Unable to start websocket server with host '${host}' and port '${this.config.port}'`,
        error instanceof Error ? error.message : undefined,
      );
    }

    wss.on('connection', (socket, req) => this.handleConnection(handler, socket, req));
    wss.on('error', (error) => {
      console.error('[WalletGate:Ws] Server error:', error);
      this.callbacks?.onError?.(error);
    });

    const address = wss.address();
    const port = typeof address === 'object' && address ? address.port : this.config.port;
    const info: ListenerInfo = { type: this.type, host, port, url: `ws://${host}:${port}` };

    this.wss = wss;
    this.callbacks = callbacks ?? null;
    this.listenerInfo = info;

    console.log(`[WalletGate:Ws] Listening on ${info.url}`);
    callbacks?.onStarted?.(info);
    return info;
  }

  async stop(): Promise<void> {
    const wss = this.wss;
    if (!wss) return;

    this.wss = null;
    this.listenerInfo = null;

    for (const open of this.sockets.values()) {
      open.socket.terminate();
    }

    await new Promise<void>((resolve, reject) => {
      wss.close((err) => {
        if (err) reject(err);
        else resolve();
      });
    });

    console.log('[WalletGate:Ws] Stopped');
    this.callbacks?.onStopped?.(this.type);
    this.callbacks = null;
  }

  private handleConnection(handler: InboundRequestHandler, socket: WebSocket, req: IncomingMessage): void {
    const socketId = generateSocketId();
    const open: OpenSocket = {
      socket,
      peer: { host: req.headers.host, remote: req.socket.remoteAddress },
      exchanges: new Set(),
    };
    this.sockets.set(socketId, open);
    console.log(`[WalletGate:Ws] Connection ${socketId} opened (remote=${open.peer.remote ?? 'unknown'})`);

    socket.on('message', (data: RawData, isBinary: boolean) => {
      const controller = new AbortController();
      open.exchanges.add(controller);

      this.handleFrame(handler, socketId, open, toInboundBody(data, isBinary), controller.signal)
        .catch((error) => {
          console.error(`[WalletGate:Ws] Error handling frame on ${socketId}:`, error);
        })
        .finally(() => open.exchanges.delete(controller));
    });

    socket.on('close', () => {
      for (const controller of open.exchanges) controller.abort();
      open.exchanges.clear();
      this.sockets.delete(socketId);
      console.log(`[WalletGate:Ws] Connection ${socketId} closed`);
    });

    socket.on('error', (error: Error) => {
      console.warn(`[WalletGate:Ws] Connection ${socketId} error:`, error.message);
    });
  }

  private async handleFrame(
    handler: InboundRequestHandler,
    socketId: string,
    open: OpenSocket,
    body: InboundBody,
    signal: AbortSignal,
  ): Promise<void> {
    const result = await handler.handleInbound({
      body,
      peer: open.peer,
      signal,
      responseTimeoutMs: this.config.responseTimeoutMs,
    });

    switch (result.outcome) {
      case 'responded':
        if (open.socket.readyState === WebSocket.OPEN) {
          open.socket.send(result.payload, { binary: isBinaryPayload(result.payload) });
        }
        break;
      case 'rejected':
        console.warn(`[WalletGate:Ws] Rejected frame on ${socketId}: ${result.error.message}`);
        break;
      case 'failed':
        console.error(`[WalletGate:Ws] Frame on ${socketId} failed: ${result.error.message}`);
        break;
      case 'accepted':
        break;
    }
  }
}

function toInboundBody(data: RawData, isBinary: boolean): InboundBody {
  const buffer = Array.isArray(data)
    ? Buffer.concat(data)
    : data instanceof ArrayBuffer
      ? Buffer.from(data)
      : data;
  return isBinary ? buffer : buffer.toString('utf8');
}
