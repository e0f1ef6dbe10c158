export type CommandMetadata = Readonly<{
  /** Principal that issued the command, when it differs from the ledger owner. */
  actorId?: string | null;
}>;

/**
 * Immutable command envelope. Subclasses copy their payload fields in the
 * constructor.
 */
export abstract class BaseCommand {
  abstract readonly type: string;
  readonly actorId: string | null;

  protected constructor(meta?: CommandMetadata) {
    this.actorId = meta?.actorId ?? null;
  }
}
