/**
 * Inbound Daemon
 *
 * Wires the inbound service to its listeners: HTTP always, WebSocket when a
 * ws port is configured.
 */

import type { InboundTransport, ListenerInfo } from '@walletgate/core';
import type { InboundCollaborators } from '../inbound/config.js';
import { InboundService } from '../inbound/service.js';
import { HttpListener } from '../listener/http-listener.js';
import { WebSocketListener } from '../listener/websocket-listener.js';
import type { DaemonSettings } from './env.js';

export interface InboundDaemonOptions {
  settings: DaemonSettings;
  collaborators: InboundCollaborators;
  /** Replaces the listeners derived from settings */
  listeners?: InboundTransport[];
}

export interface InboundDaemonInstance {
  service: InboundService;
  listeners: ListenerInfo[];
  shutdown: () => Promise<void>;
}

export function createListeners(settings: DaemonSettings): InboundTransport[] {
  const listeners: InboundTransport[] = [
    new HttpListener({
      host: settings.host,
      port: settings.port,
      maxMessageSize: settings.maxMessageSize,
    }),
  ];

  if (settings.wsPort !== undefined) {
    listeners.push(new WebSocketListener({
      host: settings.host,
      port: settings.wsPort,
      maxMessageSize: settings.maxMessageSize,
    }));
  }

  return listeners;
}

/**
 * Start the inbound daemon. A listener that fails to bind stops the ones
 * already started and rethrows its TransportSetupError.
 */
export async function startInboundDaemon(options: InboundDaemonOptions): Promise<InboundDaemonInstance> {
  const service = new InboundService({
    collaborators: options.collaborators,
    config: options.settings.inbound,
  });

  const transports = options.listeners ?? createListeners(options.settings);
  const started: InboundTransport[] = [];
  const infos: ListenerInfo[] = [];

  try {
    for (const transport of transports) {
      infos.push(await transport.start(service, {
        onError: (error) => console.error(`[WalletGate:Daemon] ${transport.type} listener error:`, error),
      }));
      started.push(transport);
    }
  } catch (error) {
    console.error('[WalletGate:Daemon] Failed to start listeners:', error instanceof Error ? error.message : error);
    await stopAll(started);
    await service.shutdown();
    throw error;
  }

  return {
    service,
    listeners: infos,
    shutdown: async () => {
      await stopAll(started);
      await service.shutdown();
      console.log('[WalletGate:Daemon] Stopped');
    },
  };
}

async function stopAll(transports: InboundTransport[]): Promise<void> {
  for (const transport of [...transports].reverse()) {
    try {
      await transport.stop();
    } catch (error) {
      console.warn(`[WalletGate:Daemon] Failed to stop ${transport.type} listener:`, error);
    }
  }
}
