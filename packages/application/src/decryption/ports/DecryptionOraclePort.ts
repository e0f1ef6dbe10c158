import type { CiphertextHandle } from '@cipherledger/domain';
import type { TypedPlaintext } from '../plaintextCodec';

/**
 * System-side plaintext access to the executor. Callers consult the
 * capability directory first.
 */
export interface DecryptionOraclePort {
  decrypt(handle: CiphertextHandle): Promise<TypedPlaintext>;
}
