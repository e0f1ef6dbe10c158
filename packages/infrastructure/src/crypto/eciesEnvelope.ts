/**
 * Serialization helpers for ECIES-sealed payloads.
 * Layout: [ephemeralRaw(65) || iv(12) || ciphertext+tag]
 */
export const ECIES_EPHEMERAL_LENGTH = 65;
export const ECIES_IV_LENGTH = 12;
export const ECIES_TAG_LENGTH = 16;

type EnvelopeParts = {
  ephemeralRaw: Uint8Array;
  iv: Uint8Array;
  payload: Uint8Array;
};

export const encodeEnvelope = (ephemeralRaw: Uint8Array, iv: Uint8Array, ciphertext: Uint8Array): Uint8Array => {
  if (ephemeralRaw.length !== ECIES_EPHEMERAL_LENGTH) {
    throw new Error('Invalid ephemeral public key length');
  }
  if (iv.length !== ECIES_IV_LENGTH) {
    throw new Error('Invalid IV length');
  }

  const out = new Uint8Array(ECIES_EPHEMERAL_LENGTH + ECIES_IV_LENGTH + ciphertext.length);
  out.set(ephemeralRaw, 0);
  out.set(iv, ECIES_EPHEMERAL_LENGTH);
  out.set(ciphertext, ECIES_EPHEMERAL_LENGTH + ECIES_IV_LENGTH);
  return out;
};

export const decodeEnvelope = (envelope: Uint8Array): EnvelopeParts => {
  if (envelope.length < ECIES_EPHEMERAL_LENGTH + ECIES_IV_LENGTH + ECIES_TAG_LENGTH) {
    throw new Error('Sealed envelope too short');
  }
  const ephemeralRaw = envelope.slice(0, ECIES_EPHEMERAL_LENGTH);
  const iv = envelope.slice(ECIES_EPHEMERAL_LENGTH, ECIES_EPHEMERAL_LENGTH + ECIES_IV_LENGTH);
  const payload = envelope.slice(ECIES_EPHEMERAL_LENGTH + ECIES_IV_LENGTH);
  return { ephemeralRaw, iv, payload };
};
