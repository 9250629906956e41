import { errorKindOf, errorMessageOf } from './errors';
import { TransportError } from '../adapters/http/errors';

describe('errorMessageOf', () => {
  it('reads the message of an Error', () => {
    expect(errorMessageOf(new TransportError('socket hang up', 'COINGECKO'))).toBe('socket hang up');
  });

  it('reads the message of an error-shaped object from another realm', () => {
    const nodeError = { code: 'ENOENT', message: "ENOENT: no such file or directory, open '/missing.json'" };

    expect(errorMessageOf(nodeError)).toBe("ENOENT: no such file or directory, open '/missing.json'");
  });

  it('falls back for strings and other values', () => {
    expect(errorMessageOf('boom')).toBe('boom');
    expect(errorMessageOf({ message: 42 })).toBe('Unknown error');
    expect(errorMessageOf(undefined)).toBe('Unknown error');
  });
});

describe('errorKindOf', () => {
  it('reports UNKNOWN for values outside the taxonomy', () => {
    expect(errorKindOf(new TransportError('reset', 'COINGECKO'))).toBe('TRANSPORT');
    expect(errorKindOf(new Error('plain'))).toBe('UNKNOWN');
  });
});
