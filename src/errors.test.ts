import { describe, it, expect } from 'vitest';
import {
  AmbiguityUnresolved,
  DedupeError,
  IndexCorruption,
  InputError,
  StoreTransactionFailure,
  describeError,
} from './errors.js';

describe('errors', () => {
  it('should name each error after its class', () => {
    const error = new InputError('/music/a.mp3', 'File is empty');

    expect(error).toBeInstanceOf(DedupeError);
    expect(error.name).toBe('InputError');
    expect(error.message).toBe('File is empty: /music/a.mp3');
  });

  it('should keep the cause of a failed commit', () => {
    const cause = new Error('disk full');
    const error = new StoreTransactionFailure('/music/a.mp3', 'AUTO_WIN', { cause });

    expect(error.message).toBe('Could not commit AUTO_WIN for /music/a.mp3');
    expect(error.cause).toBe(cause);
  });

  it('should describe index and prompt problems', () => {
    expect(new IndexCorruption(7).message).toBe('Fingerprint blocks reference missing record #7');
    expect(new AmbiguityUnresolved('/music/a.mp3', 'timed out').message).toBe(
      'Ambiguous match left unresolved (timed out): /music/a.mp3'
    );
  });

  it('should describe anything thrown', () => {
    expect(describeError(new Error('boom'))).toBe('boom');
    expect(describeError('plain')).toBe('plain');
  });
});
