import { describe, expect, it } from 'vitest';

import { AppError, isAppError } from '../../src/shared/errors/AppError.js';
import { CardinalityError, CountMismatchError } from '../../src/shared/errors/CardinalityError.js';
import { DecodeError } from '../../src/shared/errors/DecodeError.js';
import { ProtocolError, isProtocolError } from '../../src/shared/errors/ProtocolError.js';
import { TransportFailure, isTransportFailure } from '../../src/shared/errors/TransportFailure.js';
import { UnsupportedFeatureError } from '../../src/shared/errors/UnsupportedFeatureError.js';

describe('error hierarchy', () => {
  it('gives every error a code and only transport failures a retry hint', () => {
    const errors: AppError[] = [
      new TransportFailure('host.get timed out.', { reason: 'timeout', method: 'host.get', url: 'http://zabbix.test' }),
      new ProtocolError('host.get', { code: -32602, message: 'Invalid params.' }),
      new CardinalityError(0),
      new CountMismatchError(2, 1),
      new UnsupportedFeatureError('mfa', '6.4.0'),
      new DecodeError('bad record'),
      new AppError('plain')
    ];

    expect(errors.map((error) => [error.name, error.code, error.retryable])).toEqual([
      ['TransportFailure', 'TRANSPORT_FAILURE', true],
      ['ProtocolError', 'PROTOCOL_ERROR', false],
      ['CardinalityError', 'CARDINALITY_ERROR', false],
      ['CountMismatchError', 'COUNT_MISMATCH', false],
      ['UnsupportedFeatureError', 'UNSUPPORTED_FEATURE', false],
      ['DecodeError', 'DECODE_ERROR', false],
      ['AppError', 'INTERNAL_ERROR', false]
    ]);
    expect(errors.every(isAppError)).toBe(true);
  });

  it('tells protocol errors and transport failures apart', () => {
    const protocol = new ProtocolError('user.login', { code: -32500, message: 'Application error.', data: 'Login failed.' });
    const transport = new TransportFailure('user.login could not reach http://zabbix.test.', {
      reason: 'network',
      method: 'user.login',
      url: 'http://zabbix.test'
    });

    expect(isProtocolError(protocol)).toBe(true);
    expect(isTransportFailure(protocol)).toBe(false);
    expect(isTransportFailure(transport)).toBe(true);
    expect(protocol.message).toBe('-32500 (Application error.): Login failed.');
  });

  it('keeps the cause of a transport failure', () => {
    const cause = new TypeError('fetch failed');
    const failure = new TransportFailure('x', { reason: 'network', method: 'host.get', url: 'http://zabbix.test', cause });

    expect(failure.cause).toBe(cause);
    expect(failure.details).toEqual({ reason: 'network', method: 'host.get', url: 'http://zabbix.test' });
  });

  it('serializes to a plain summary', () => {
    const error = new UnsupportedFeatureError('mfa', '');

    expect(JSON.parse(JSON.stringify(error))).toEqual({
      name: 'UnsupportedFeatureError',
      code: 'UNSUPPORTED_FEATURE',
      message: 'mfa is not supported by server version unknown.',
      retryable: false,
      details: { feature: 'mfa', version: '' },
      suggestions: ['Log in or force a version before calling version-gated operations.']
    });
    expect(new AppError('plain').toJSON()).toEqual({
      name: 'AppError',
      code: 'INTERNAL_ERROR',
      message: 'plain',
      retryable: false
    });
  });

  it('names the unknown version when nothing was detected', () => {
    expect(new UnsupportedFeatureError('history.push', '').message).toBe(
      'history.push is not supported by server version unknown.'
    );
  });
});
