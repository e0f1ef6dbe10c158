import { CiphertextHandle } from '@cipherledger/domain';
import type { CryptoServicePort } from '../shared/ports/CryptoServicePort';
import { decodePlaintext, encodePlaintext, type TypedPlaintext } from './plaintextCodec';
import type { SealedValue } from './types';

export async function sealValue(
  crypto: CryptoServicePort,
  handle: CiphertextHandle,
  plaintext: TypedPlaintext,
  sessionPublicKey: Uint8Array
): Promise<SealedValue> {
  const sealed = await crypto.seal(encodePlaintext(plaintext), sessionPublicKey, handle.toBytes());
  return { handle: handle.value, sealed };
}

/**
 * Open a value sealed to the session key. Fails if it was sealed for a
 * different handle.
 */
export async function openSealedValue(
  crypto: CryptoServicePort,
  value: SealedValue,
  sessionPrivateKey: Uint8Array
): Promise<TypedPlaintext> {
  const handle = CiphertextHandle.from(value.handle);
  const plaintext = await crypto.open(value.sealed, sessionPrivateKey, handle.toBytes());
  return decodePlaintext(plaintext);
}
