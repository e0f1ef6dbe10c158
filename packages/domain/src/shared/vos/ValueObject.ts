/**
 * Base class for all value objects in the domain.
 *
 * Encapsulates an immutable value and provides common equality
 * and stringification semantics. Concrete value objects expose their
 * underlying value via the `value` getter.
 */
export abstract class ValueObject<TValue> {
  protected constructor() {
    // Concrete value objects store their own representation.
  }

  abstract get value(): TValue;

  /**
   * Structural equality based on the exposed `value`.
   */
  equals(other: ValueObject<TValue>): boolean {
    return Object.is(this.value, other.value);
  }

  toString(): string {
    const v: unknown = this.value;
    if (typeof v === 'string') return v;
    if (typeof v === 'bigint' || typeof v === 'number') return v.toString();
    return JSON.stringify(v);
  }
}
