import { describe, it, expect } from 'vitest';
import {
  EtherlinkConfigError,
  EtherlinkEncodeError,
  EtherlinkError,
  TransportConnectionError,
  TransportError,
  TransportMaxReconnectError,
  TransportWriteError,
  toTransportError,
} from './errors.js';
import { EncodeFailureReason } from './constants/constants.js';

describe('errors', () => {
  it('sets names and keeps the hierarchy', () => {
    const err = new TransportMaxReconnectError(5);
    expect(err.name).toBe('TransportMaxReconnectError');
    expect(err.message).toBe('Max reconnect attempts (5) reached');
    expect(err).toBeInstanceOf(TransportConnectionError);
    expect(err).toBeInstanceOf(TransportError);
    expect(err).toBeInstanceOf(EtherlinkError);
    expect(err).toBeInstanceOf(Error);
  });

  it('has a default config message', () => {
    expect(new EtherlinkConfigError().message).toBe('Invalid Etherlink configuration');
  });

  it('describes encode failures', () => {
    const err = new EtherlinkEncodeError(EncodeFailureReason.MissingPayload);
    expect(err.reason).toBe(EncodeFailureReason.MissingPayload);
    expect(err.message).toBe('Cannot encode frame: payload is missing but length is non-zero');
  });

  describe('toTransportError', () => {
    it('passes transport errors through', () => {
      const original = new TransportWriteError('short write');
      expect(toTransportError(original)).toBe(original);
    });

    it('recognises common port failures', () => {
      expect(toTransportError(new Error('Error: Access denied'))).toEqual(
        new TransportConnectionError('Permission denied')
      );
      expect(toTransportError(new Error('Error Resource busy, cannot open'))).toEqual(
        new TransportConnectionError('Port is busy')
      );
      expect(toTransportError(new Error('Error: No such file or directory'))).toEqual(
        new TransportConnectionError('Port does not exist')
      );
    });

    it('falls back to the given class', () => {
      const err = toTransportError('odd failure', TransportWriteError);
      expect(err).toBeInstanceOf(TransportWriteError);
      expect(err.message).toBe('odd failure');
      expect(toTransportError(new Error('x'))).toBeInstanceOf(TransportError);
    });
  });
});
