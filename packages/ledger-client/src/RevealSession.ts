import {
  ApplicationError,
  LedgerErrorCodes,
  encodeAuthorization,
  openSealedValue,
  type CryptoServicePort,
  type KeyPair,
  type TypedPlaintext,
  type UserDecryptionAuthorization,
} from '@cipherledger/application';
import {
  RevealErrorCodes,
  RevealStatusKinds,
  type LedgerGatewayPort,
  type RevealError,
  type RevealErrorCode,
  type RevealStatus,
  type WalletPort,
} from './types';

export type RevealSessionOptions = Readonly<{
  handle: string;
  systemAddress: string;
  gateway: Pick<LedgerGatewayPort, 'userDecrypt'>;
  wallet: WalletPort;
  crypto: CryptoServicePort;
  durationDays?: number;
  /** Unix seconds. */
  now?: () => number;
  onStatusChange?: (status: RevealStatus) => void;
}>;

export type RevealOutcome =
  | Readonly<{ ok: true; plaintext: TypedPlaintext }>
  | Readonly<{ ok: false; error: RevealError }>;

const DEFAULT_DURATION_DAYS = 1;

class RevealAborted extends Error {
  constructor(readonly error: RevealError) {
    super(error.message);
    this.name = 'RevealAborted';
  }
}

type CancelSignal = Readonly<{
  promise: Promise<never>;
  abort: () => void;
}>;

const createCancelSignal = (): CancelSignal => {
  let abort: () => void = () => undefined;
  const promise = new Promise<never>((_, reject) => {
    abort = () =>
      reject(new RevealAborted({ code: RevealErrorCodes.cancelled, message: 'Reveal cancelled' }));
  });
  // Observed through Promise.race only.
  promise.catch(() => undefined);
  return { promise, abort };
};

const remoteErrorCode = (error: unknown): RevealErrorCode => {
  if (error instanceof ApplicationError) {
    if (error.code === LedgerErrorCodes.capabilityDenied) return RevealErrorCodes.capabilityDenied;
    if (error.code === LedgerErrorCodes.invalidAuthorization) return RevealErrorCodes.invalidAuthorization;
  }
  return RevealErrorCodes.remoteServiceUnavailable;
};

const messageOf = (error: unknown, fallback: string): string =>
  error instanceof Error && error.message ? error.message : fallback;

/**
 * Client side of a single reveal:
 * idle -> generating_session_keys -> awaiting_authorization_signature ->
 * requesting_remote_reencryption -> opening_locally -> completed.
 *
 * Cancelling or any failure returns the session to idle and wipes the
 * session private key. A session can be started again from idle; completed
 * is terminal.
 */
export class RevealSession {
  private status: RevealStatus = { kind: RevealStatusKinds.idle, lastError: null };
  private sessionKeys: KeyPair | null = null;
  private cancelSignal: CancelSignal | null = null;
  private readonly now: () => number;
  private readonly durationDays: number;

  constructor(private readonly options: RevealSessionOptions) {
    this.now = options.now ?? (() => Math.floor(Date.now() / 1000));
    this.durationDays = options.durationDays ?? DEFAULT_DURATION_DAYS;
  }

  getStatus(): RevealStatus {
    return this.status;
  }

  hasSessionKeys(): boolean {
    return this.sessionKeys !== null;
  }

  async start(): Promise<RevealOutcome> {
    if (this.status.kind === RevealStatusKinds.completed) {
      throw new Error('Reveal session already completed');
    }
    if (this.status.kind !== RevealStatusKinds.idle) {
      throw new Error('Reveal already in progress');
    }
    const signal = createCancelSignal();
    this.cancelSignal = signal;

    try {
      const plaintext = await this.run(signal);
      this.wipeKeys();
      this.cancelSignal = null;
      this.setStatus({ kind: RevealStatusKinds.completed, plaintext });
      return { ok: true, plaintext };
    } catch (error) {
      if (!(error instanceof RevealAborted)) throw error;
      // cancel() has already reset the status.
      if (this.cancelSignal === signal) {
        this.wipeKeys();
        this.cancelSignal = null;
        this.setStatus({ kind: RevealStatusKinds.idle, lastError: error.error });
      }
      return { ok: false, error: error.error };
    }
  }

  /**
   * Abandon an in-flight reveal. Takes effect immediately even when the
   * wallet or the remote service never answers. No-op when idle or completed.
   */
  cancel(): void {
    const signal = this.cancelSignal;
    if (!signal) return;
    this.cancelSignal = null;
    this.wipeKeys();
    signal.abort();
    this.setStatus({
      kind: RevealStatusKinds.idle,
      lastError: { code: RevealErrorCodes.cancelled, message: 'Reveal cancelled' },
    });
  }

  private async run(signal: CancelSignal): Promise<TypedPlaintext> {
    const { crypto, wallet, gateway, handle, systemAddress } = this.options;

    this.setStatus({ kind: RevealStatusKinds.generatingSessionKeys });
    const keys = await this.race(signal, crypto.generateEncryptionKeyPair(), RevealErrorCodes.openFailed);
    this.sessionKeys = keys;

    this.setStatus({ kind: RevealStatusKinds.awaitingAuthorizationSignature });
    const authorization: UserDecryptionAuthorization = {
      sessionPublicKey: keys.publicKey,
      systemAddresses: [systemAddress],
      startTimestamp: this.now(),
      durationDays: this.durationDays,
    };
    const signature = await this.race(
      signal,
      wallet.signAuthorization(encodeAuthorization(authorization)),
      RevealErrorCodes.signatureRejected
    );

    this.setStatus({ kind: RevealStatusKinds.requestingRemoteReencryption });
    const sealedValues = await this.race(
      signal,
      gateway.userDecrypt({
        handles: [handle],
        user: wallet.address,
        signerPublicKey: wallet.publicKey,
        signature,
        authorization,
      }),
      remoteErrorCode
    );
    const sealed = sealedValues.find((v) => v.handle.toLowerCase() === handle.toLowerCase());
    if (!sealed) {
      throw new RevealAborted({
        code: RevealErrorCodes.remoteServiceUnavailable,
        message: `Re-encryption response is missing handle ${handle}`,
      });
    }

    this.setStatus({ kind: RevealStatusKinds.openingLocally });
    return this.race(signal, openSealedValue(crypto, sealed, keys.privateKey), RevealErrorCodes.openFailed);
  }

  private async race<T>(
    signal: CancelSignal,
    step: Promise<T>,
    onError: RevealErrorCode | ((error: unknown) => RevealErrorCode)
  ): Promise<T> {
    try {
      return await Promise.race([step, signal.promise]);
    } catch (error) {
      if (error instanceof RevealAborted) throw error;
      const code = typeof onError === 'function' ? onError(error) : onError;
      throw new RevealAborted({ code, message: messageOf(error, 'Reveal step failed') });
    }
  }

  private wipeKeys(): void {
    if (this.sessionKeys) {
      this.sessionKeys.privateKey.fill(0);
      this.sessionKeys = null;
    }
  }

  private setStatus(next: RevealStatus): void {
    this.status = next;
    this.options.onStatusChange?.(next);
  }
}
