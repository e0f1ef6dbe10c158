import { encodePlaintext, type CryptoServicePort, type TypedPlaintext } from '@cipherledger/application';
import { EncryptedTypes, UserAddress } from '@cipherledger/domain';
import { encodeInputProof, inputBinding, inputHandle, MAX_INPUT_VALUES } from './inputProof';

export type EncryptedInput = Readonly<{
  handles: string[];
  inputProof: Uint8Array;
}>;

/**
 * Collects typed plaintexts for one submission.
 *
 * @example
 * ```typescript
 * const input = await encoder
 *   .createEncryptedInput(systemAddress, userAddress)
 *   .add32(7)
 *   .encrypt();
 * ```
 */
export class EncryptedInputBuilder {
  private readonly values: TypedPlaintext[] = [];

  constructor(
    private readonly crypto: CryptoServicePort,
    private readonly networkPublicKey: Uint8Array,
    private readonly system: UserAddress,
    private readonly submitter: UserAddress
  ) {}

  add32(value: number): this {
    return this.push({ type: EncryptedTypes.euint32, value });
  }

  addBool(value: boolean): this {
    return this.push({ type: EncryptedTypes.ebool, value: value ? 1 : 0 });
  }

  async encrypt(): Promise<EncryptedInput> {
    if (this.values.length === 0) {
      throw new Error('Encrypted input has no values');
    }
    const envelopes: Uint8Array[] = [];
    const handles: string[] = [];
    for (const [index, value] of this.values.entries()) {
      const binding = inputBinding(this.system, this.submitter, index);
      const envelope = await this.crypto.seal(encodePlaintext(value), this.networkPublicKey, binding);
      envelopes.push(envelope);
      handles.push((await inputHandle(this.crypto, envelope, binding)).value);
    }
    return {
      handles,
      inputProof: encodeInputProof({ system: this.system, submitter: this.submitter, envelopes }),
    };
  }

  private push(value: TypedPlaintext): this {
    if (this.values.length >= MAX_INPUT_VALUES) {
      throw new Error(`Encrypted input holds at most ${MAX_INPUT_VALUES} values`);
    }
    encodePlaintext(value); // throws on out-of-range values
    this.values.push(value);
    return this;
  }
}

/**
 * Client-side encoder binding plaintexts to one ledger system's network key.
 */
export class EncryptedInputEncoder {
  constructor(
    private readonly crypto: CryptoServicePort,
    private readonly networkPublicKey: Uint8Array
  ) {}

  createEncryptedInput(systemAddress: string, submitter: string): EncryptedInputBuilder {
    return new EncryptedInputBuilder(
      this.crypto,
      this.networkPublicKey,
      UserAddress.from(systemAddress),
      UserAddress.from(submitter)
    );
  }
}
