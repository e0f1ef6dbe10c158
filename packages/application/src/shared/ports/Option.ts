/**
 * Result of a keyed lookup that may find nothing, e.g. a ledger record for a
 * user who has never been scored.
 */
export type Option<T> = Readonly<{ kind: 'some'; value: T }> | Readonly<{ kind: 'none' }>;

const NONE: Option<never> = { kind: 'none' };

export const some = <T>(value: T): Option<T> => ({ kind: 'some', value });

export const none = (): Option<never> => NONE;

export const fromNullable = <T>(value: T | null | undefined): Option<T> =>
  value === null || value === undefined ? NONE : some(value);

export const mapOption = <T, U>(option: Option<T>, fn: (value: T) => U): Option<U> =>
  option.kind === 'some' ? some(fn(option.value)) : NONE;

export const getOrElse = <T>(option: Option<T>, fallback: () => T): T =>
  option.kind === 'some' ? option.value : fallback();
