/**
 * HTTP Listener Tests
 *
 * Runs the listener on an ephemeral loopback port against a real inbound
 * service with in-process collaborators.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { TransportSetupError, type ListenerInfo } from '@walletgate/core';
import { InboundService } from '../../src/inbound/service.js';
import { HttpListener, INTERNAL_ERROR_TEXT, INVITATION_TEXT } from '../../src/listener/http-listener.js';
import {
  createDispatcher,
  createResolver,
  createStoreProvider,
  createUnpacker,
  testMessage,
} from '../helpers.js';

describe('HttpListener', () => {
  let listener: HttpListener;
  let service: InboundService;
  let unpacker: ReturnType<typeof createUnpacker>;
  let info: ListenerInfo;

  beforeEach(async () => {
    unpacker = createUnpacker();
    const { provider } = createStoreProvider(['alice']);
    service = new InboundService({
      collaborators: {
        unpacker,
        dispatcher: createDispatcher().dispatcher,
        resolver: createResolver(),
        storeProvider: provider,
      },
      config: { settings: { tenantRouting: true }, responseTimeoutMs: 5000 },
    });
    listener = new HttpListener({ host: '127.0.0.1', port: 0, maxMessageSize: 256 });
    info = await listener.start(service);
  });

  afterEach(async () => {
    await listener.stop();
    await service.shutdown();
  });

  function post(body: string | Buffer, contentType = 'application/json', signal?: AbortSignal) {
    return fetch(`${info.url}/`, {
      method: 'POST',
      headers: { 'content-type': contentType },
      body,
      signal,
    });
  }

  it('should report the bound address', () => {
    expect(info.type).toBe('http');
    expect(info.host).toBe('127.0.0.1');
    expect(info.port).toBeGreaterThan(0);
    expect(info.url).toBe(`http://127.0.0.1:${info.port}`);
    expect(listener.info).toEqual(info);
  });

  it('should answer 200 with an empty body when no direct response is requested', async () => {
    const res = await post(testMessage({ text: 'hello' }));

    expect(res.status).toBe(200);
    expect(await res.text()).toBe('');
  });

  it('should return a text response as JSON', async () => {
    const res = await post(testMessage({ direct: true, reply: '{"ok":true}' }));

    expect(res.status).toBe(200);
    expect(res.headers.get('content-type')).toBe('application/json; charset=utf-8');
    expect(await res.text()).toBe('{"ok":true}');
  });

  it('should answer a bare 200 for an empty reply', async () => {
    const res = await post(testMessage({ direct: true, reply: '' }));

    expect(res.status).toBe(200);
    expect(res.headers.get('content-type')).toBeNull();
    expect(await res.text()).toBe('');
  });

  it('should return a binary response as agent wire content', async () => {
    const res = await post(
      Buffer.from(testMessage({ direct: true, replyBytes: [1, 2, 3] })),
      'application/octet-stream',
    );

    expect(res.status).toBe(200);
    expect(res.headers.get('content-type')).toBe('application/ssi-agent-wire');
    expect(new Uint8Array(await res.arrayBuffer())).toEqual(new Uint8Array([1, 2, 3]));
    expect(unpacker.unpack.mock.calls[0]?.[0]).toBeInstanceOf(Uint8Array);
  });

  it('should pass JSON bodies on as text', async () => {
    const body = testMessage({ text: 'hello' });
    await post(body, 'Application/JSON; charset=utf-8');

    expect(unpacker.unpack.mock.calls[0]?.[0]).toBe(body);
  });

  it('should answer 400 for messages that cannot be unpacked', async () => {
    const res = await post('garbage', 'application/octet-stream');

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: 'Message parse failed: not a packed message' });
  });

  it('should answer 500 when the tenant cannot be opened', async () => {
    const res = await post(testMessage({ to: ['carol'] }));

    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({ error: INTERNAL_ERROR_TEXT });
    expect(INTERNAL_ERROR_TEXT).toBe('Internal server error');
  });

  it('should answer 413 for oversized bodies', async () => {
    const res = await post(testMessage({ text: 'x'.repeat(512) }));

    expect(res.status).toBe(413);
    expect(unpacker.unpack).not.toHaveBeenCalled();
  });

  it('should answer invitation probes', async () => {
    const res = await fetch(`${info.url}/?c_i=eyJ0eXBlIjoiaW52aXRhdGlvbiJ9`);

    expect(res.status).toBe(200);
    expect(res.headers.get('content-type')).toBe('text/plain; charset=utf-8');
    expect(await res.text()).toBe(INVITATION_TEXT);
  });

  it('should answer plain GET requests with an empty body', async () => {
    const res = await fetch(`${info.url}/`);

    expect(res.status).toBe(200);
    expect(await res.text()).toBe('');
  });

  it('should cancel the exchange when the client disconnects', async () => {
    const controller = new AbortController();
    const pending = post(testMessage({ direct: true }), 'application/json', controller.signal);
    await vi.waitFor(() => expect(service.getStatus().exchanges[0]?.state).toBe('awaiting_response'));

    controller.abort();

    await expect(pending).rejects.toThrow();
    await vi.waitFor(() => expect(service.getStatus().openExchanges).toBe(0));
  });

  it('should refuse to start twice', async () => {
    await expect(listener.start(service)).rejects.toThrow('HttpListener already started');
  });

  it('should fail with TransportSetupError when the port is taken', async () => {
    const second = new HttpListener({ host: '127.0.0.1', port: info.port });

    const error = await second.start(service).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TransportSetupError);
    expect(error).toMatchObject({
      message: `Unable to start webserver with host '127.0.0.1' and port '${info.port}'`,
    });
    expect(second.info).toBeNull();
  });

  it('should notify callbacks and tolerate repeated stops', async () => {
    const onStarted = vi.fn();
    const onStopped = vi.fn();
    const other = new HttpListener({ host: '127.0.0.1', port: 0 });

    const otherInfo = await other.start(service, { onStarted, onStopped });
    await other.stop();
    await other.stop();

    expect(onStarted).toHaveBeenCalledWith(otherInfo);
    expect(onStopped).toHaveBeenCalledTimes(1);
    expect(onStopped).toHaveBeenCalledWith('http');
    expect(other.info).toBeNull();
  });
});
