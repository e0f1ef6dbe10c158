import { Timestamp } from '@cipherledger/domain';
import { parseFields, type FieldParser, type ParsedFromSpec } from '../parseFields';

/**
 * Base class for handlers that parse primitives into value objects while
 * collecting structured validation errors.
 */
export abstract class BaseCommandHandler {
  protected parseCommand<TCommand, TSpec extends Record<string, FieldParser<TCommand, unknown>>>(
    command: TCommand,
    spec: TSpec
  ): ParsedFromSpec<TCommand, TSpec> {
    return parseFields(command, spec);
  }

  protected parseTimestamp(millis: number): Timestamp {
    return Timestamp.fromMillis(millis);
  }

  protected parseNonNegativeInteger(value: number, field: string): number {
    if (!Number.isSafeInteger(value) || value < 0) {
      throw new Error(`${field} must be a non-negative integer`);
    }
    return value;
  }
}
