import { describe, it, expect } from 'vitest';
import { encodePayload, mediaType, readInboundBody } from '../../src/listener/content.js';

describe('mediaType', () => {
  it('should strip parameters and normalize case', () => {
    expect(mediaType('Application/JSON; charset=utf-8')).toBe('application/json');
    expect(mediaType(' application/ssi-agent-wire ')).toBe('application/ssi-agent-wire');
  });

  it('should treat a missing header as empty', () => {
    expect(mediaType(undefined)).toBe('');
  });
});

describe('readInboundBody', () => {
  it('should decode JSON bodies to text', () => {
    expect(readInboundBody('application/json', Buffer.from('{"a":1}'))).toBe('{"a":1}');
  });

  it('should keep other bodies as bytes', () => {
    const raw = Buffer.from([1, 2, 3]);
    expect(readInboundBody('application/ssi-agent-wire', raw)).toBe(raw);
    expect(readInboundBody(undefined, raw)).toBe(raw);
  });
});

describe('encodePayload', () => {
  it('should send text as JSON', () => {
    expect(encodePayload('{"ok":true}')).toEqual({
      contentType: 'application/json',
      body: '{"ok":true}',
    });
  });

  it('should send bytes as agent wire content', () => {
    const encoded = encodePayload(new Uint8Array([4, 5]));
    expect(encoded.contentType).toBe('application/ssi-agent-wire');
    expect(encoded.body).toEqual(Buffer.from([4, 5]));
  });
});
