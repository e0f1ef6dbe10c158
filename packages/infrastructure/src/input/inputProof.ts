import type { CryptoServicePort } from '@cipherledger/application';
import { CiphertextHandle, UserAddress } from '@cipherledger/domain';

export const INPUT_PROOF_VERSION = 1;
export const MAX_INPUT_VALUES = 255;

const ADDRESS_LENGTH = 20;
const HEADER_LENGTH = 2 + ADDRESS_LENGTH * 2;

/**
 * Wire form of an input proof:
 * `[version(1) | count(1) | system(20) | submitter(20) | (length(2) | envelope)*count]`
 */
export type InputProof = Readonly<{
  system: UserAddress;
  submitter: UserAddress;
  envelopes: readonly Uint8Array[];
}>;

export function encodeInputProof(proof: InputProof): Uint8Array {
  if (proof.envelopes.length === 0 || proof.envelopes.length > MAX_INPUT_VALUES) {
    throw new Error(`Input must carry 1-${MAX_INPUT_VALUES} values`);
  }
  const bodyLength = proof.envelopes.reduce((sum, e) => sum + 2 + e.length, 0);
  const out = new Uint8Array(HEADER_LENGTH + bodyLength);
  const view = new DataView(out.buffer);
  out[0] = INPUT_PROOF_VERSION;
  out[1] = proof.envelopes.length;
  out.set(proof.system.toBytes(), 2);
  out.set(proof.submitter.toBytes(), 2 + ADDRESS_LENGTH);

  let offset = HEADER_LENGTH;
  for (const envelope of proof.envelopes) {
    if (envelope.length > 0xffff) {
      throw new Error('Input envelope too large');
    }
    view.setUint16(offset, envelope.length, false);
    out.set(envelope, offset + 2);
    offset += 2 + envelope.length;
  }
  return out;
}

export function decodeInputProof(bytes: Uint8Array): InputProof {
  if (bytes.length < HEADER_LENGTH) {
    throw new Error('Input proof too short');
  }
  if (bytes[0] !== INPUT_PROOF_VERSION) {
    throw new Error(`Unsupported input proof version ${bytes[0]}`);
  }
  const count = bytes[1];
  if (count === 0) {
    throw new Error('Input proof carries no values');
  }
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  const system = UserAddress.fromBytes(bytes.slice(2, 2 + ADDRESS_LENGTH));
  const submitter = UserAddress.fromBytes(bytes.slice(2 + ADDRESS_LENGTH, HEADER_LENGTH));

  const envelopes: Uint8Array[] = [];
  let offset = HEADER_LENGTH;
  for (let i = 0; i < count; i++) {
    if (offset + 2 > bytes.length) {
      throw new Error('Input proof truncated');
    }
    const length = view.getUint16(offset, false);
    const end = offset + 2 + length;
    if (end > bytes.length) {
      throw new Error('Input proof truncated');
    }
    envelopes.push(bytes.slice(offset + 2, end));
    offset = end;
  }
  if (offset !== bytes.length) {
    throw new Error('Input proof has trailing bytes');
  }
  return { system, submitter, envelopes };
}

/**
 * Associated data sealing value `index` of an input to its system and submitter.
 */
export function inputBinding(system: UserAddress, submitter: UserAddress, index: number): Uint8Array {
  const out = new Uint8Array(ADDRESS_LENGTH * 2 + 1);
  out.set(system.toBytes(), 0);
  out.set(submitter.toBytes(), ADDRESS_LENGTH);
  out[ADDRESS_LENGTH * 2] = index;
  return out;
}

/**
 * Handle committed to by value `index`: SHA-256 over its envelope and binding.
 */
export async function inputHandle(
  crypto: CryptoServicePort,
  envelope: Uint8Array,
  binding: Uint8Array
): Promise<CiphertextHandle> {
  const data = new Uint8Array(envelope.length + binding.length);
  data.set(envelope, 0);
  data.set(binding, envelope.length);
  return CiphertextHandle.fromBytes(await crypto.digest(data));
}
