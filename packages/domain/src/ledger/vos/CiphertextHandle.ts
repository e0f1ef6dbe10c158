import { Assert } from '../../shared/Assert';
import { ValueObject } from '../../shared/vos/ValueObject';

const HANDLE_PATTERN = /^0x[0-9a-fA-F]{64}$/;
const EMPTY_HANDLE = `0x${'0'.repeat(64)}`;

/**
 * Opaque 32-byte reference to a ciphertext held by the executor.
 *
 * The all-zero handle is the empty sentinel returned for aggregates that
 * have never been written.
 */
export class CiphertextHandle extends ValueObject<string> {
  private constructor(private readonly _value: string) {
    super();
  }

  static readonly EMPTY = new CiphertextHandle(EMPTY_HANDLE);

  static from(value: string): CiphertextHandle {
    Assert.that(value, 'CiphertextHandle').matches(HANDLE_PATTERN);
    return new CiphertextHandle(value.toLowerCase());
  }

  static fromBytes(bytes: Uint8Array): CiphertextHandle {
    Assert.that(bytes.length, 'CiphertextHandle byte length').satisfies((n) => n === 32, 'must be 32');
    return new CiphertextHandle(`0x${Buffer.from(bytes).toString('hex')}`);
  }

  static isValid(value: string): boolean {
    return HANDLE_PATTERN.test(value);
  }

  get isEmpty(): boolean {
    return this._value === EMPTY_HANDLE;
  }

  toBytes(): Uint8Array {
    return new Uint8Array(Buffer.from(this._value.slice(2), 'hex'));
  }

  get value(): string {
    return this._value;
  }
}
