import { describe, expect, it } from 'vitest';

import {
  CorrelationIdCounter,
  createRequestEnvelope,
  describeRequest,
  parseResponseEnvelope,
  serializeEnvelope
} from '../../src/infrastructure/rpc/protocol.js';

describe('CorrelationIdCounter', () => {
  it('starts at 1 and never repeats', () => {
    const ids = new CorrelationIdCounter();

    expect(ids.current).toBe(0);
    expect([ids.next(), ids.next(), ids.next()]).toEqual([1, 2, 3]);
    expect(ids.current).toBe(3);
  });
});

describe('request envelopes', () => {
  it('omits auth when no token is given', () => {
    const envelope = createRequestEnvelope(7, 'apiinfo.version', []);

    expect(serializeEnvelope(envelope)).toBe('{"jsonrpc":"2.0","method":"apiinfo.version","params":[],"id":7}');
  });

  it('places the token between params and id', () => {
    const envelope = createRequestEnvelope(2, 'host.get', { output: 'extend' }, 'test-token');

    expect(serializeEnvelope(envelope)).toBe(
      '{"jsonrpc":"2.0","method":"host.get","params":{"output":"extend"},"auth":"test-token","id":2}'
    );
  });

  it('treats an empty token as no token', () => {
    expect(createRequestEnvelope(1, 'host.get', {}, '')).not.toHaveProperty('auth');
  });

  it('rejects non-positive ids', () => {
    expect(() => createRequestEnvelope(0, 'host.get', {})).toThrow();
  });

  it('masks passwords and the token for tracing', () => {
    const envelope = createRequestEnvelope(
      3,
      'user.update',
      [{ userid: '1', passwd: 'test-secret', current_passwd: 'old-secret', medias: [{ password: 'x' }] }],
      'test-token'
    );

    expect(describeRequest(envelope)).toBe(
      '{"jsonrpc":"2.0","method":"user.update","params":[{"userid":"1","passwd":"[redacted]","current_passwd":"[redacted]","medias":[{"password":"[redacted]"}]}],"auth":"[redacted]","id":3}'
    );
  });
});

describe('parseResponseEnvelope', () => {
  it('returns the result of a successful call', () => {
    expect(parseResponseEnvelope('{"jsonrpc":"2.0","result":"7.0.0","id":1}')).toEqual({
      jsonrpc: '2.0',
      result: '7.0.0',
      id: 1
    });
  });

  it('accepts an error with a null id', () => {
    const envelope = parseResponseEnvelope(
      '{"jsonrpc":"2.0","error":{"code":-32700,"message":"Parse error.","data":"Invalid JSON."},"id":null}'
    );

    expect(envelope.error).toEqual({ code: -32700, message: 'Parse error.', data: 'Invalid JSON.' });
    expect(envelope.id).toBeNull();
  });

  it('keeps a null result', () => {
    expect(parseResponseEnvelope('{"jsonrpc":"2.0","result":null,"id":4}').result).toBeNull();
  });

  it('rejects an envelope with neither result nor error', () => {
    expect(() => parseResponseEnvelope('{"jsonrpc":"2.0","id":1}')).toThrow(/neither result nor error/);
  });

  it('rejects text that is not JSON', () => {
    expect(() => parseResponseEnvelope('<html>502</html>')).toThrow(SyntaxError);
  });
});
