import { describe, expect, it } from 'vitest';
import { decodePlaintext, encodePlaintext } from '../../src/decryption/plaintextCodec';
import { authorizationExpiresAt, encodeAuthorization } from '../../src/decryption/authorization';

describe('plaintextCodec', () => {
  it('encodes a type code followed by a big-endian u32', () => {
    expect(Array.from(encodePlaintext({ type: 'euint32', value: 0x01020304 }))).toEqual([4, 1, 2, 3, 4]);
    expect(Array.from(encodePlaintext({ type: 'ebool', value: 1 }))).toEqual([0, 0, 0, 0, 1]);
  });

  it('decodes what it encodes', () => {
    expect(decodePlaintext(encodePlaintext({ type: 'euint32', value: 4_294_967_295 }))).toEqual({
      type: 'euint32',
      value: 4_294_967_295,
    });
  });

  it('rejects values outside u32', () => {
    expect(() => encodePlaintext({ type: 'euint32', value: 2 ** 32 })).toThrow(
      'Plaintext must be an unsigned 32-bit integer, got 4294967296'
    );
    expect(() => encodePlaintext({ type: 'ebool', value: 2 })).toThrow('Boolean plaintext must be 0 or 1, got 2');
  });

  it('rejects malformed encodings', () => {
    expect(() => decodePlaintext(new Uint8Array(4))).toThrow('Encoded plaintext must be 5 bytes, got 4');
    expect(() => decodePlaintext(new Uint8Array([9, 0, 0, 0, 0]))).toThrow('Unknown encrypted type code 9');
  });
});

describe('encodeAuthorization', () => {
  const authorization = {
    sessionPublicKey: new Uint8Array([1, 2, 3]),
    systemAddresses: ['0x5FbDB2315678afecb367f032d93F642f64180aa3'],
    startTimestamp: 1_700_000_000,
    durationDays: 10,
  };

  it('renders a canonical text form', () => {
    expect(new TextDecoder().decode(encodeAuthorization(authorization))).toBe(
      [
        'cipherledger/user-decryption/v1',
        'session:AQID',
        'systems:0x5fbdb2315678afecb367f032d93f642f64180aa3',
        'start:1700000000',
        'days:10',
      ].join('\n')
    );
  });

  it('computes the expiry in seconds', () => {
    expect(authorizationExpiresAt(authorization)).toBe(1_700_000_000 + 10 * 86_400);
  });
});
