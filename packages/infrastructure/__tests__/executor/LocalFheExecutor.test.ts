import { beforeEach, describe, expect, it } from 'vitest';
import { CiphertextHandle, UserAddress } from '@cipherledger/domain';
import { NodeCryptoService } from '../../src/crypto/NodeCryptoService';
import { InMemoryCiphertextStore } from '../../src/executor/InMemoryCiphertextStore';
import { LocalFheExecutor } from '../../src/executor/LocalFheExecutor';
import { EncryptedInputEncoder } from '../../src/input/EncryptedInputEncoder';
import { InputProofVerifier } from '../../src/input/InputProofVerifier';
import { generateNetworkKeys } from '../../src/wiring';

const system = '0x5fbdb2315678afecb367f032d93f642f64180aa3';
const alice = '0x70997970c51812dc3a010c7d01b50e0d17dc79c8';

describe('LocalFheExecutor', () => {
  const crypto = new NodeCryptoService();
  let store: InMemoryCiphertextStore;
  let executor: LocalFheExecutor;
  let encrypt: (...values: number[]) => Promise<CiphertextHandle[]>;

  beforeEach(async () => {
    const network = await generateNetworkKeys(crypto);
    store = new InMemoryCiphertextStore();
    executor = await LocalFheExecutor.create({
      store,
      crypto,
      networkStorageKey: network.storageKey,
      networkPrivateKey: network.privateKey,
    });
    const encoder = new EncryptedInputEncoder(crypto, network.publicKey);
    const verifier = new InputProofVerifier(crypto, executor, UserAddress.from(system));

    encrypt = async (...values) => {
      const builder = encoder.createEncryptedInput(system, alice);
      values.forEach((v) => builder.add32(v));
      const input = await builder.encrypt();
      const handles: CiphertextHandle[] = [];
      for (const handle of input.handles) {
        handles.push(
          await verifier.verify({
            handle: CiphertextHandle.from(handle),
            inputProof: input.inputProof,
            submitter: UserAddress.from(alice),
          })
        );
      }
      return handles;
    };
  });

  it('adds and divides', async () => {
    const [a, b] = await encrypt(7, 8);
    const sum = await executor.add(a, b);
    const average = await executor.divideByScalar(sum, 2);

    expect(await executor.decrypt(sum)).toEqual({ type: 'euint32', value: 15 });
    expect(await executor.decrypt(average)).toEqual({ type: 'euint32', value: 7 });
  });

  it('wraps sums modulo 2^32', async () => {
    const [a, b] = await encrypt(4_294_967_295, 3);
    expect((await executor.decrypt(await executor.add(a, b))).value).toBe(2);
  });

  it('compares against scalars and combines booleans', async () => {
    const [low, mid, high] = await encrypt(0, 5, 11);
    const inRange = async (h: CiphertextHandle) =>
      executor.revealBoolean(await executor.and(await executor.greaterOrEqual(h, 1), await executor.lessOrEqual(h, 10)));

    expect(await inRange(low)).toBe(false);
    expect(await inRange(mid)).toBe(true);
    expect(await inRange(high)).toBe(false);
  });

  it('issues a fresh handle for every result', async () => {
    const [a, b] = await encrypt(1, 2);
    const first = await executor.add(a, b);
    const second = await executor.add(a, b);

    expect(first.equals(second)).toBe(false);
    expect(store.size).toBe(4);
  });

  it('deletes discarded results from the arena', async () => {
    const [a] = await encrypt(3);
    const flag = await executor.greaterOrEqual(a, 1);

    await executor.discard([flag]);

    expect(store.size).toBe(1);
    expect(await store.get(flag.value)).toBeNull();
    await expect(executor.revealBoolean(flag)).rejects.toThrow(`Unknown ciphertext handle ${flag.value}`);
  });

  it('keeps values encrypted at rest and bound to their handle', async () => {
    const [a] = await encrypt(9);
    const entry = await store.get(a.value);

    expect(entry?.type).toBe('euint32');
    expect(entry?.ciphertext).toHaveLength(12 + 5 + 16);

    const moved = CiphertextHandle.from(`0x${'ab'.repeat(32)}`);
    if (entry) {
      await store.put({ ...entry, handle: moved.value });
    }
    await expect(executor.decrypt(moved)).rejects.toBeInstanceOf(Error);
  });

  it('rejects operands of the wrong type', async () => {
    const [a] = await encrypt(3);
    const flag = await executor.greaterOrEqual(a, 1);

    await expect(executor.add(a, flag)).rejects.toThrow('Expected euint32 operand, got ebool');
    await expect(executor.revealBoolean(a)).rejects.toThrow('Expected ebool operand, got euint32');
  });

  it('rejects unknown handles and non-positive divisors', async () => {
    const [a] = await encrypt(3);
    await expect(executor.decrypt(CiphertextHandle.from(`0x${'cd'.repeat(32)}`))).rejects.toThrow(
      'Unknown ciphertext handle'
    );
    await expect(executor.divideByScalar(a, 0)).rejects.toThrow('Divisor must be a positive integer, got 0');
  });
});
