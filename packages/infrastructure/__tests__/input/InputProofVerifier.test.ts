import { beforeEach, describe, expect, it } from 'vitest';
import { CiphertextHandle, UserAddress } from '@cipherledger/domain';
import { InvalidProofError } from '@cipherledger/application';
import { NodeCryptoService } from '../../src/crypto/NodeCryptoService';
import { InMemoryCiphertextStore } from '../../src/executor/InMemoryCiphertextStore';
import { LocalFheExecutor } from '../../src/executor/LocalFheExecutor';
import { EncryptedInputEncoder } from '../../src/input/EncryptedInputEncoder';
import { InputProofVerifier } from '../../src/input/InputProofVerifier';
import { decodeInputProof, encodeInputProof, inputBinding, inputHandle } from '../../src/input/inputProof';
import { generateNetworkKeys } from '../../src/wiring';

const system = '0x5fbdb2315678afecb367f032d93f642f64180aa3';
const otherSystem = '0xe7f1725e7734ce288f8367e1bb143e90bb3f0512';
const alice = '0x70997970c51812dc3a010c7d01b50e0d17dc79c8';
const bob = '0x3c44cdddb6a900fa2b585dd299e03d12fa4293bc';

describe('InputProofVerifier', () => {
  const crypto = new NodeCryptoService();
  let encoder: EncryptedInputEncoder;
  let executor: LocalFheExecutor;
  let store: InMemoryCiphertextStore;
  let verifier: InputProofVerifier;

  beforeEach(async () => {
    const network = await generateNetworkKeys(crypto);
    store = new InMemoryCiphertextStore();
    executor = await LocalFheExecutor.create({
      store,
      crypto,
      networkStorageKey: network.storageKey,
      networkPrivateKey: network.privateKey,
    });
    encoder = new EncryptedInputEncoder(crypto, network.publicKey);
    verifier = new InputProofVerifier(crypto, executor, UserAddress.from(system));
  });

  const verify = (handle: string, inputProof: Uint8Array, submitter = alice) =>
    verifier.verify({ handle: CiphertextHandle.from(handle), inputProof, submitter: UserAddress.from(submitter) });

  it('accepts every handle covered by the proof', async () => {
    const input = await encoder.createEncryptedInput(system, alice).add32(3).addBool(true).encrypt();

    const first = await verify(input.handles[0], input.inputProof);
    const second = await verify(input.handles[1], input.inputProof);

    expect(first.value).toBe(input.handles[0]);
    expect(await executor.decrypt(first)).toEqual({ type: 'euint32', value: 3 });
    expect(await executor.decrypt(second)).toEqual({ type: 'ebool', value: 1 });
  });

  it('rejects an empty proof', async () => {
    const input = await encoder.createEncryptedInput(system, alice).add32(3).encrypt();
    await expect(verify(input.handles[0], new Uint8Array())).rejects.toThrow('Input proof is empty');
  });

  it('rejects a proof replayed by another principal', async () => {
    const input = await encoder.createEncryptedInput(system, alice).add32(3).encrypt();
    await expect(verify(input.handles[0], input.inputProof, bob)).rejects.toThrow(
      'Input proof is bound to another submitter'
    );
    expect(store.size).toBe(0);
  });

  it('rejects a proof built for another system', async () => {
    const input = await encoder.createEncryptedInput(otherSystem, alice).add32(3).encrypt();
    await expect(verify(input.handles[0], input.inputProof)).rejects.toThrow('Input proof is bound to another system');
  });

  it('rejects a handle the proof does not commit to', async () => {
    const input = await encoder.createEncryptedInput(system, alice).add32(3).encrypt();
    await expect(verify(`0x${'11'.repeat(32)}`, input.inputProof)).rejects.toThrow(
      'Handle is not covered by the input proof'
    );
  });

  it('rejects a proof whose header was rewritten to another submitter', async () => {
    const input = await encoder.createEncryptedInput(system, alice).add32(3).encrypt();
    const decoded = decodeInputProof(input.inputProof);
    const forged = encodeInputProof({ ...decoded, submitter: UserAddress.from(bob) });

    // The handle commits to the original binding, so no envelope matches.
    await expect(verify(input.handles[0], forged, bob)).rejects.toThrow('Handle is not covered by the input proof');
  });

  it('rejects malformed bytes as an invalid proof', async () => {
    const input = await encoder.createEncryptedInput(system, alice).add32(3).encrypt();
    const truncated = input.inputProof.slice(0, input.inputProof.length - 1);

    const error = await verify(input.handles[0], truncated).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(InvalidProofError);
    expect(error).toMatchObject({ message: 'Malformed input proof: Input proof truncated' });
  });

  it('rejects an envelope that fails authentication', async () => {
    const input = await encoder.createEncryptedInput(system, alice).add32(3).encrypt();
    const decoded = decodeInputProof(input.inputProof);
    const tampered = decoded.envelopes[0].slice();
    tampered[tampered.length - 1] ^= 0xff;
    const proof = encodeInputProof({ ...decoded, envelopes: [tampered] });
    const handle = await inputHandle(crypto, tampered, inputBinding(decoded.system, decoded.submitter, 0));

    await expect(verify(handle.value, proof)).rejects.toThrow('Input ciphertext failed authentication');
  });
});

describe('EncryptedInputEncoder', () => {
  const crypto = new NodeCryptoService();

  it('refuses empty inputs and out-of-range values', async () => {
    const network = await generateNetworkKeys(crypto);
    const encoder = new EncryptedInputEncoder(crypto, network.publicKey);

    await expect(encoder.createEncryptedInput(system, alice).encrypt()).rejects.toThrow('Encrypted input has no values');
    expect(() => encoder.createEncryptedInput(system, alice).add32(-1)).toThrow(
      'Plaintext must be an unsigned 32-bit integer, got -1'
    );
  });

  it('produces distinct handles for equal plaintexts', async () => {
    const network = await generateNetworkKeys(crypto);
    const encoder = new EncryptedInputEncoder(crypto, network.publicKey);
    const a = await encoder.createEncryptedInput(system, alice).add32(5).encrypt();
    const b = await encoder.createEncryptedInput(system, alice).add32(5).encrypt();

    expect(a.handles[0]).not.toBe(b.handles[0]);
  });
});
