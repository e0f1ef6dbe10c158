import { Assert } from '../../shared/Assert';
import { AggregateId } from '../../shared/vos/AggregateId';

const ADDRESS_PATTERN = /^0x[0-9a-fA-F]{40}$/;
const ZERO_ADDRESS = `0x${'0'.repeat(40)}`;

/**
 * 20-byte principal address, rendered as lowercase `0x` hex.
 *
 * Identifies both the owner of a trust ledger and any principal asking for
 * decryption rights. The all-zero address is well-formed but reserved:
 * callers decide whether it yields an empty result or an error.
 *
 * @example
 * ```typescript
 * const user = UserAddress.from('0x70997970C51812dc3A010C7d01b50e0d17dc79C8');
 * user.value; // '0x70997970c51812dc3a010c7d01b50e0d17dc79c8'
 * ```
 */
export class UserAddress extends AggregateId {
  private constructor(private readonly _value: string) {
    super();
  }

  static from(value: string): UserAddress {
    Assert.that(value, 'UserAddress').matches(ADDRESS_PATTERN);
    return new UserAddress(value.toLowerCase());
  }

  static fromBytes(bytes: Uint8Array): UserAddress {
    Assert.that(bytes.length, 'UserAddress byte length').satisfies((n) => n === 20, 'must be 20');
    return new UserAddress(`0x${Buffer.from(bytes).toString('hex')}`);
  }

  static zero(): UserAddress {
    return new UserAddress(ZERO_ADDRESS);
  }

  static isValid(value: string): boolean {
    return ADDRESS_PATTERN.test(value);
  }

  get isZero(): boolean {
    return this._value === ZERO_ADDRESS;
  }

  toBytes(): Uint8Array {
    return new Uint8Array(Buffer.from(this._value.slice(2), 'hex'));
  }

  get value(): string {
    return this._value;
  }
}
