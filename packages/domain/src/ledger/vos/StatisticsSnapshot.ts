import { Assert } from '../../shared/Assert';
import { ValueObject } from '../../shared/vos/ValueObject';

const COUNT_BITS = 32n;
const ACTIVITY_OFFSET = 32n;
const HAS_DATA_BIT = 64n;
const U32_MASK = (1n << 32n) - 1n;

export type StatisticsSnapshotProps = Readonly<{
  eventCount: number;
  /** Unix seconds; 0 when the user has never recorded an event. */
  lastActivity: number;
  hasData: boolean;
}>;

/**
 * Per-user statistics packed into one unsigned 256-bit word.
 *
 * Layout: bits [0, 32) event count, bits [32, 64) last activity in unix
 * seconds, bit 64 has-data, all higher bits zero.
 */
export class StatisticsSnapshot extends ValueObject<bigint> {
  private constructor(private readonly props: StatisticsSnapshotProps) {
    super();
  }

  static readonly EMPTY = new StatisticsSnapshot({ eventCount: 0, lastActivity: 0, hasData: false });

  static of(props: StatisticsSnapshotProps): StatisticsSnapshot {
    Assert.that(props.eventCount, 'eventCount').isInteger().isGreaterThanOrEqual(0);
    Assert.that(BigInt(props.eventCount), 'eventCount').fitsInBits(Number(COUNT_BITS));
    Assert.that(props.lastActivity, 'lastActivity').isInteger().isGreaterThanOrEqual(0);
    Assert.that(BigInt(props.lastActivity), 'lastActivity').fitsInBits(32);
    return new StatisticsSnapshot({ ...props });
  }

  /**
   * Decode a packed word. Bits above 64 are ignored.
   */
  static unpack(word: bigint): StatisticsSnapshot {
    Assert.that(word, 'StatisticsSnapshot').fitsInBits(256);
    return new StatisticsSnapshot({
      eventCount: Number(word & U32_MASK),
      lastActivity: Number((word >> ACTIVITY_OFFSET) & U32_MASK),
      hasData: ((word >> HAS_DATA_BIT) & 1n) === 1n,
    });
  }

  pack(): bigint {
    return (
      BigInt(this.props.eventCount) |
      (BigInt(this.props.lastActivity) << ACTIVITY_OFFSET) |
      ((this.props.hasData ? 1n : 0n) << HAS_DATA_BIT)
    );
  }

  get eventCount(): number {
    return this.props.eventCount;
  }

  get lastActivity(): number {
    return this.props.lastActivity;
  }

  get hasData(): boolean {
    return this.props.hasData;
  }

  get value(): bigint {
    return this.pack();
  }
}
