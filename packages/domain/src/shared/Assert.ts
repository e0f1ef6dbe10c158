/**
 * Fluent assertion DSL for domain invariants.
 *
 * @example
 * ```typescript
 * Assert.that(index, 'EventIndex').isInteger().isGreaterThanOrEqual(0);
 * Assert.that(handle, 'CiphertextHandle').matches(HANDLE_PATTERN);
 * Assert.that(ledger.isFull, 'Ledger is full').isFalse();
 * ```
 */
export class Assert<T> {
  private constructor(
    private readonly value: T,
    private readonly name?: string
  ) {}

  static that<T>(value: T, name?: string): Assert<T> {
    return new Assert(value, name);
  }

  // === String Assertions ===

  isNonEmpty(): this {
    if (typeof this.value !== 'string' || this.value.length === 0) {
      throw new Error(this.formatError('must be a non-empty string', this.value));
    }
    return this;
  }

  matches(pattern: RegExp): this {
    if (typeof this.value !== 'string' || !pattern.test(this.value)) {
      throw new Error(this.formatError(`must match pattern ${pattern}`, this.value));
    }
    return this;
  }

  // === Number Assertions ===

  isGreaterThanOrEqual(min: number): this {
    if (typeof this.value !== 'number' || this.value < min) {
      throw new Error(this.formatError(`must be greater than or equal to ${min}`, this.value));
    }
    return this;
  }

  isInteger(): this {
    if (typeof this.value !== 'number' || !Number.isInteger(this.value)) {
      throw new Error(this.formatError('must be an integer', this.value));
    }
    return this;
  }

  // === BigInt Assertions ===

  fitsInBits(bits: number): this {
    if (typeof this.value !== 'bigint' || this.value < 0n || this.value >= 1n << BigInt(bits)) {
      throw new Error(this.formatError(`must fit in ${bits} unsigned bits`, this.value));
    }
    return this;
  }

  // === Boolean Assertions ===

  isFalse(): this {
    if (this.value !== false) {
      throw new Error(this.formatError('must be false', this.value));
    }
    return this;
  }

  // === Custom Predicate ===

  satisfies(predicate: (value: T) => boolean, errorMessage?: string): this {
    if (!predicate(this.value)) {
      throw new Error(this.formatError(errorMessage || 'must satisfy predicate', this.value));
    }
    return this;
  }

  // === Private Helpers ===

  private formatError(message: string, value: unknown): string {
    const prefix = this.name ? `${this.name} ` : 'Value ';
    const valueStr =
      value === undefined
        ? 'undefined'
        : value === null
          ? 'null'
          : typeof value === 'bigint'
            ? `${value.toString()}n`
            : JSON.stringify(value);
    return `${prefix}${message}, got: ${valueStr}`;
  }
}
