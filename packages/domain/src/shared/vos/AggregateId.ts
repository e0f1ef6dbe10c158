import { ValueObject } from './ValueObject';

/**
 * Base class for aggregate identifiers.
 *
 * Aggregate IDs are value objects wrapping a canonical string (for the
 * ledger, a lowercase `0x` address) that keys one aggregate's state.
 */
export abstract class AggregateId extends ValueObject<string> {}
