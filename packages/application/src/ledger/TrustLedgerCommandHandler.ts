import {
  ActorId,
  BATCH_HARD_CAP,
  BATCH_MAX,
  BATCH_MIN,
  CiphertextHandle,
  SCORE_MAX,
  SCORE_MIN,
  TrustLedger,
  UserAddress,
  type StatisticsSnapshot,
} from '@cipherledger/domain';
import {
  BatchSizeInvalidError,
  CapacityExceededError,
  EmptyProofError,
  InvalidAddressError,
} from '../errors/ledgerErrors';
import { BaseCommandHandler } from '../shared/ports/BaseCommandHandler';
import type { EventBusPort } from '../shared/ports/EventBusPort';
import { getOrElse } from '../shared/ports/Option';
import { KeyedSerialQueue } from '../shared/KeyedSerialQueue';
import type { RecordTrustEvent, ValidateBatch, ViewStatistics } from './commands';
import type { CapabilityDirectoryPort } from './ports/CapabilityDirectoryPort';
import type { EncryptedComputePort } from './ports/EncryptedComputePort';
import type { InputVerifierPort } from './ports/InputVerifierPort';
import type { TrustLedgerRepositoryPort } from './ports/TrustLedgerRepositoryPort';
import { foldScore } from './services/Accumulator';
import { GrantingCompute } from './services/GrantingCompute';

export type RecordTrustEventResult = Readonly<{
  user: string;
  index: number;
  eventCount: number;
  handle: string;
}>;

export type TrustLedgerCommandHandlerDeps = Readonly<{
  repository: TrustLedgerRepositoryPort;
  verifier: InputVerifierPort;
  compute: EncryptedComputePort;
  directory: CapabilityDirectoryPort;
  eventBus: EventBusPort;
  /** Address under which the hosting system holds its own grants. */
  systemAddress: UserAddress;
}>;

/**
 * Orchestrates proof verification, the homomorphic fold, capability grants
 * and persistence for the mutating ledger operations.
 *
 * Mutations for one user run strictly one after another; the store itself
 * takes no locks.
 */
export class TrustLedgerCommandHandler extends BaseCommandHandler {
  private readonly queue = new KeyedSerialQueue();

  constructor(private readonly deps: TrustLedgerCommandHandlerDeps) {
    super();
  }

  async handleRecord(command: RecordTrustEvent): Promise<RecordTrustEventResult> {
    if (command.inputProof.length === 0) {
      throw new EmptyProofError();
    }
    const { user, handle, recordedAt, recordedBy } = this.parseCommand(command, {
      user: (c) => UserAddress.from(c.user),
      handle: (c) => CiphertextHandle.from(c.handle),
      recordedAt: (c) => this.parseTimestamp(c.timestamp),
      recordedBy: (c) => ActorId.from(c.actorId ?? c.user),
    });
    if (user.isZero) {
      throw new InvalidAddressError();
    }

    return this.queue.run(user.value, async () => {
      const loaded = await this.deps.repository.load(user);
      const ledger = getOrElse(loaded, () => TrustLedger.create(user));
      if (ledger.isFull) {
        throw new CapacityExceededError();
      }

      const verified = await this.deps.verifier.verify({
        handle,
        inputProof: command.inputProof,
        submitter: user,
      });

      const compute = this.computeFor(user);
      const score = await compute.adopt(verified);
      const folded = await foldScore(compute, { total: ledger.total, eventCount: ledger.eventCount }, score);

      const index = ledger.record({
        handle: score,
        total: folded.total,
        average: folded.average,
        recordedAt,
        recordedBy,
      });
      await this.commit(ledger);

      return {
        user: user.value,
        index,
        eventCount: ledger.eventCount,
        handle: score.value,
      };
    });
  }

  /**
   * Homomorphic `1 <= score <= 10` over each verified input. Only the final
   * boolean of each item is decrypted.
   */
  async handleValidateBatch(command: ValidateBatch): Promise<boolean[]> {
    if (command.handles.length !== command.inputProofs.length) {
      throw new BatchSizeInvalidError('Handles and proofs length mismatch');
    }
    if (command.handles.length > BATCH_HARD_CAP) {
      throw new BatchSizeInvalidError(`Batch size exceeds the hard cap of ${BATCH_HARD_CAP}`);
    }
    if (command.handles.length < BATCH_MIN || command.handles.length > BATCH_MAX) {
      throw new BatchSizeInvalidError(`Batch size must be ${BATCH_MIN}-${BATCH_MAX}`);
    }

    const { user, handles } = this.parseCommand(command, {
      user: (c) => UserAddress.from(c.user),
      handles: (c) => c.handles.map((h) => CiphertextHandle.from(h)),
    });
    if (user.isZero) {
      throw new InvalidAddressError();
    }

    const verified: CiphertextHandle[] = [];
    for (const [i, handle] of handles.entries()) {
      verified.push(
        await this.deps.verifier.verify({
          handle,
          inputProof: command.inputProofs[i],
          submitter: user,
        })
      );
    }

    // Range-check results never leave this method: they get no grants and
    // are dropped once revealed.
    const { compute } = this.deps;
    const results: boolean[] = [];
    const rangeChecks: CiphertextHandle[] = [];
    try {
      for (const score of verified) {
        const atLeastMin = await compute.greaterOrEqual(score, SCORE_MIN);
        const atMostMax = await compute.lessOrEqual(score, SCORE_MAX);
        const inRange = await compute.and(atLeastMin, atMostMax);
        rangeChecks.push(atLeastMin, atMostMax, inRange);
        results.push(await compute.revealBoolean(inRange));
      }
    } finally {
      if (rangeChecks.length > 0) {
        await compute.discard(rangeChecks);
      }
    }
    return results;
  }

  async handleViewStatistics(command: ViewStatistics): Promise<StatisticsSnapshot> {
    const { user, viewedBy, viewedAt } = this.parseCommand(command, {
      user: (c) => UserAddress.from(c.user),
      viewedBy: (c) => ActorId.from(c.viewedBy),
      viewedAt: (c) => this.parseTimestamp(c.timestamp),
    });
    if (user.isZero) {
      throw new InvalidAddressError();
    }

    return this.queue.run(user.value, async () => {
      const loaded = await this.deps.repository.load(user);
      if (loaded.kind === 'none') {
        // No record yet: report the empty statistics without creating one.
        const transient = TrustLedger.create(user);
        const snapshot = transient.viewStatistics({ viewedAt, viewedBy });
        await this.deps.eventBus.publish(transient.getUncommittedEvents());
        return snapshot;
      }

      const ledger = loaded.value;
      const snapshot = ledger.viewStatistics({ viewedAt, viewedBy });
      await this.commit(ledger);
      return snapshot;
    });
  }

  private computeFor(owner: UserAddress): GrantingCompute {
    return new GrantingCompute(this.deps.compute, this.deps.directory, this.deps.systemAddress, owner);
  }

  private async commit(ledger: TrustLedger): Promise<void> {
    const events = ledger.getUncommittedEvents();
    await this.deps.repository.save(ledger);
    ledger.markEventsAsCommitted();
    await this.deps.eventBus.publish(events);
  }
}
