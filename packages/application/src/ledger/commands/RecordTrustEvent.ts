import { BaseCommand, type CommandMetadata } from '../../shared/ports/BaseCommand';

export type RecordTrustEventPayload = {
  user: string;
  handle: string;
  inputProof: Uint8Array;
  timestamp: number;
};

export class RecordTrustEvent extends BaseCommand implements Readonly<RecordTrustEventPayload> {
  readonly type = 'RecordTrustEvent';
  readonly user: string;
  readonly handle: string;
  readonly inputProof: Uint8Array;
  readonly timestamp: number;

  constructor(payload: RecordTrustEventPayload, meta?: CommandMetadata) {
    super(meta);
    this.user = payload.user;
    this.handle = payload.handle;
    this.inputProof = payload.inputProof;
    this.timestamp = payload.timestamp;
  }
}
