import type { CiphertextHandle } from '@cipherledger/domain';
import type { GrantingCompute } from './GrantingCompute';

export type AccumulatorState = Readonly<{
  total: CiphertextHandle;
  eventCount: number;
}>;

export type FoldResult = Readonly<{
  total: CiphertextHandle;
  average: CiphertextHandle;
  eventCount: number;
}>;

/**
 * Folds one score ciphertext into the running aggregates using only
 * homomorphic addition and division by the plaintext count.
 */
export async function foldScore(
  compute: GrantingCompute,
  current: AccumulatorState,
  score: CiphertextHandle
): Promise<FoldResult> {
  const eventCount = current.eventCount + 1;
  const total = current.eventCount === 0 ? score : await compute.add(current.total, score);
  const average = await compute.divideByScalar(total, eventCount);
  return { total, average, eventCount };
}
