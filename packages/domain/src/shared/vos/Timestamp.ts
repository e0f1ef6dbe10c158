import { ValueObject } from './ValueObject';

/**
 * Value object representing a point in time.
 *
 * Canonical representation is epoch milliseconds. The ledger stores and
 * packs last-activity times as whole unix seconds, hence the second-based
 * helpers.
 */
export class Timestamp extends ValueObject<number> {
  private constructor(private readonly _value: number) {
    super();
  }

  static now(): Timestamp {
    return new Timestamp(Date.now());
  }

  static fromMillis(value: number): Timestamp {
    if (!Number.isFinite(value)) {
      throw new Error('Timestamp must be a finite number of milliseconds');
    }
    return new Timestamp(value);
  }

  static fromUnixSeconds(seconds: number): Timestamp {
    if (!Number.isInteger(seconds) || seconds < 0) {
      throw new Error('Timestamp must be a non-negative whole number of seconds');
    }
    return new Timestamp(seconds * 1000);
  }

  toUnixSeconds(): number {
    return Math.floor(this._value / 1000);
  }

  toISOString(): string {
    return new Date(this._value).toISOString();
  }

  equals(other: Timestamp): boolean {
    return this._value === other._value;
  }

  toString(): string {
    return this.toISOString();
  }

  get value(): number {
    return this._value;
  }
}
