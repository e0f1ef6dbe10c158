import { BaseCommand } from '../../shared/ports/BaseCommand';

export type ValidateBatchPayload = {
  user: string;
  handles: readonly string[];
  inputProofs: readonly Uint8Array[];
};

export class ValidateBatch extends BaseCommand implements Readonly<ValidateBatchPayload> {
  readonly type = 'ValidateBatch';
  readonly user: string;
  readonly handles: readonly string[];
  readonly inputProofs: readonly Uint8Array[];

  constructor(payload: ValidateBatchPayload) {
    super();
    this.user = payload.user;
    this.handles = [...payload.handles];
    this.inputProofs = [...payload.inputProofs];
  }
}
