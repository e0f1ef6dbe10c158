import { randomBytes } from 'node:crypto';
import { CiphertextHandle, EncryptedTypes, type EncryptedType } from '@cipherledger/domain';
import {
  decodePlaintext,
  encodePlaintext,
  type CryptoServicePort,
  type DecryptionOraclePort,
  type EncryptedComputePort,
  type TypedPlaintext,
} from '@cipherledger/application';
import type { CiphertextStorePort } from './CiphertextStorePort';

const ARENA_KEY_CONTEXT = 'ciphertext-arena';

export type LocalFheExecutorOptions = Readonly<{
  store: CiphertextStorePort;
  crypto: CryptoServicePort;
  /** 32-byte master secret; the arena key is derived from it. */
  networkStorageKey: Uint8Array;
  /** PKCS#8 ECDH key that external inputs are sealed to. */
  networkPrivateKey: Uint8Array;
}>;

/**
 * In-process stand-in for the confidential coprocessor.
 *
 * Values live in the arena encrypted under a network-held key, with the
 * handle as associated data so an entry cannot be replayed under another
 * handle. Operations open their operands, compute, and seal the result
 * under a fresh random handle. Plaintexts never leave this class except
 * through `revealBoolean` and `decrypt`, which callers gate on the
 * capability directory.
 */
export class LocalFheExecutor implements EncryptedComputePort, DecryptionOraclePort {
  private constructor(
    private readonly store: CiphertextStorePort,
    private readonly crypto: CryptoServicePort,
    private readonly arenaKey: Uint8Array,
    private readonly networkPrivateKey: Uint8Array
  ) {}

  static async create(options: LocalFheExecutorOptions): Promise<LocalFheExecutor> {
    const arenaKey = await options.crypto.deriveKey(options.networkStorageKey, ARENA_KEY_CONTEXT);
    return new LocalFheExecutor(options.store, options.crypto, arenaKey, options.networkPrivateKey);
  }

  /**
   * Open an externally sealed input and store it under the handle the input
   * proof committed to. Throws if the envelope fails authentication.
   */
  async ingestExternal(handle: CiphertextHandle, envelope: Uint8Array, aad: Uint8Array): Promise<void> {
    const plaintext = decodePlaintext(await this.crypto.open(envelope, this.networkPrivateKey, aad));
    await this.write(handle, plaintext);
  }

  async add(a: CiphertextHandle, b: CiphertextHandle): Promise<CiphertextHandle> {
    const [x, y] = await Promise.all([this.read(a, EncryptedTypes.euint32), this.read(b, EncryptedTypes.euint32)]);
    return this.produce({ type: EncryptedTypes.euint32, value: (x + y) >>> 0 });
  }

  async divideByScalar(a: CiphertextHandle, divisor: number): Promise<CiphertextHandle> {
    if (!Number.isInteger(divisor) || divisor <= 0) {
      throw new Error(`Divisor must be a positive integer, got ${divisor}`);
    }
    const x = await this.read(a, EncryptedTypes.euint32);
    return this.produce({ type: EncryptedTypes.euint32, value: Math.floor(x / divisor) });
  }

  async greaterOrEqual(a: CiphertextHandle, scalar: number): Promise<CiphertextHandle> {
    const x = await this.read(a, EncryptedTypes.euint32);
    return this.produce({ type: EncryptedTypes.ebool, value: x >= scalar ? 1 : 0 });
  }

  async lessOrEqual(a: CiphertextHandle, scalar: number): Promise<CiphertextHandle> {
    const x = await this.read(a, EncryptedTypes.euint32);
    return this.produce({ type: EncryptedTypes.ebool, value: x <= scalar ? 1 : 0 });
  }

  async and(a: CiphertextHandle, b: CiphertextHandle): Promise<CiphertextHandle> {
    const [x, y] = await Promise.all([this.read(a, EncryptedTypes.ebool), this.read(b, EncryptedTypes.ebool)]);
    return this.produce({ type: EncryptedTypes.ebool, value: x & y });
  }

  async revealBoolean(handle: CiphertextHandle): Promise<boolean> {
    return (await this.read(handle, EncryptedTypes.ebool)) === 1;
  }

  async discard(handles: readonly CiphertextHandle[]): Promise<void> {
    await this.store.delete(handles.map((handle) => handle.value));
  }

  async decrypt(handle: CiphertextHandle): Promise<TypedPlaintext> {
    const entry = await this.store.get(handle.value);
    if (!entry) {
      throw new Error(`Unknown ciphertext handle ${handle.value}`);
    }
    return decodePlaintext(await this.crypto.decrypt(entry.ciphertext, this.arenaKey, handle.toBytes()));
  }

  private async read(handle: CiphertextHandle, expected: EncryptedType): Promise<number> {
    const plaintext = await this.decrypt(handle);
    if (plaintext.type !== expected) {
      throw new Error(`Expected ${expected} operand, got ${plaintext.type} for ${handle.value}`);
    }
    return plaintext.value;
  }

  private async produce(plaintext: TypedPlaintext): Promise<CiphertextHandle> {
    const handle = CiphertextHandle.fromBytes(new Uint8Array(randomBytes(32)));
    await this.write(handle, plaintext);
    return handle;
  }

  private async write(handle: CiphertextHandle, plaintext: TypedPlaintext): Promise<void> {
    const ciphertext = await this.crypto.encrypt(encodePlaintext(plaintext), this.arenaKey, handle.toBytes());
    await this.store.put({ handle: handle.value, type: plaintext.type, ciphertext });
  }
}
