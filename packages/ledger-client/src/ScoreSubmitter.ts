import type { NetworkInfo } from '@cipherledger/application';
import { InvalidScoreError } from './errors';
import type { EncryptedInputPort, LedgerGatewayPort, RecordEventResponse } from './types';

export const MIN_SCORE = 1;
export const MAX_SCORE = 10;

export type ScoreSubmitterOptions = Readonly<{
  gateway: Pick<LedgerGatewayPort, 'getNetwork' | 'recordEvent' | 'validateBatch'>;
  encoder: EncryptedInputPort;
  /** Address the inputs are bound to; must match the caller the API sees. */
  submitter: string;
}>;

const assertScore = (score: number): void => {
  if (!Number.isInteger(score) || score < MIN_SCORE || score > MAX_SCORE) {
    throw new InvalidScoreError(score);
  }
};

/**
 * Encrypts scores on the client and sends them to the ledger. The network
 * info is fetched once and reused.
 */
export class ScoreSubmitter {
  private network: Promise<NetworkInfo> | null = null;

  constructor(private readonly options: ScoreSubmitterOptions) {}

  async submit(score: number): Promise<RecordEventResponse> {
    assertScore(score);
    const input = await this.options.encoder.encrypt({
      network: await this.networkInfo(),
      submitter: this.options.submitter,
      values: [score],
    });
    return this.options.gateway.recordEvent({ handle: input.handles[0], inputProof: input.inputProof });
  }

  /**
   * Asks the ledger whether each value lies in the score range. Values are
   * sent as given; out-of-range ones come back false.
   */
  async validate(values: readonly number[]): Promise<boolean[]> {
    const network = await this.networkInfo();
    const inputs = await Promise.all(
      values.map((value) =>
        this.options.encoder.encrypt({ network, submitter: this.options.submitter, values: [value] })
      )
    );
    return this.options.gateway.validateBatch({
      handles: inputs.map((i) => i.handles[0]),
      inputProofs: inputs.map((i) => i.inputProof),
    });
  }

  private networkInfo(): Promise<NetworkInfo> {
    if (!this.network) {
      this.network = this.options.gateway.getNetwork().catch((error: unknown) => {
        this.network = null;
        throw error;
      });
    }
    return this.network;
  }
}
