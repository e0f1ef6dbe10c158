import type {
  NetworkInfo,
  SealedValue,
  TypedPlaintext,
  UserDecryptionRequest,
} from '@cipherledger/application';

export const RevealStatusKinds = {
  idle: 'idle',
  generatingSessionKeys: 'generating_session_keys',
  awaitingAuthorizationSignature: 'awaiting_authorization_signature',
  requestingRemoteReencryption: 'requesting_remote_reencryption',
  openingLocally: 'opening_locally',
  completed: 'completed',
} as const;

export type RevealStatusKind = (typeof RevealStatusKinds)[keyof typeof RevealStatusKinds];

export const RevealErrorCodes = {
  cancelled: 'cancelled',
  signatureRejected: 'signature_rejected',
  remoteServiceUnavailable: 'remote_service_unavailable',
  capabilityDenied: 'capability_denied',
  invalidAuthorization: 'invalid_authorization',
  openFailed: 'open_failed',
} as const;

export type RevealErrorCode = (typeof RevealErrorCodes)[keyof typeof RevealErrorCodes];

export type RevealError = Readonly<{
  code: RevealErrorCode;
  message: string;
}>;

export type RevealStatus =
  | Readonly<{ kind: typeof RevealStatusKinds.idle; lastError: RevealError | null }>
  | Readonly<{ kind: typeof RevealStatusKinds.generatingSessionKeys }>
  | Readonly<{ kind: typeof RevealStatusKinds.awaitingAuthorizationSignature }>
  | Readonly<{ kind: typeof RevealStatusKinds.requestingRemoteReencryption }>
  | Readonly<{ kind: typeof RevealStatusKinds.openingLocally }>
  | Readonly<{ kind: typeof RevealStatusKinds.completed; plaintext: TypedPlaintext }>;

/**
 * The holder's signing identity. Signing may wait on a human indefinitely.
 */
export interface WalletPort {
  readonly address: string;
  /** SPKI-encoded P-256 ECDSA public key. */
  readonly publicKey: Uint8Array;
  signAuthorization(payload: Uint8Array): Promise<Uint8Array>;
}

export type RecordEventRequest = Readonly<{
  handle: string;
  inputProof: Uint8Array;
}>;

export type RecordEventResponse = Readonly<{
  user: string;
  index: number;
  eventCount: number;
  handle: string;
}>;

export type StatisticsView = Readonly<{
  eventCount: number;
  lastActivity: number;
  hasData: boolean;
}>;

export type CachedStatisticsView = StatisticsView &
  Readonly<{
    /** Packed 256-bit word as 0x-prefixed hex. */
    packed: string;
  }>;

/**
 * Remote ledger as seen by the client.
 */
export interface LedgerGatewayPort {
  getNetwork(): Promise<NetworkInfo>;
  recordEvent(request: RecordEventRequest): Promise<RecordEventResponse>;
  validateBatch(request: { handles: readonly string[]; inputProofs: readonly Uint8Array[] }): Promise<boolean[]>;
  getTotal(user: string): Promise<string>;
  getAverage(user: string): Promise<string>;
  getEventCount(user: string): Promise<number>;
  getHistoryLength(user: string): Promise<number>;
  getLastActivity(user: string): Promise<number>;
  getByIndex(user: string, index: number): Promise<string>;
  getRange(user: string, start: number, end: number): Promise<string[]>;
  getLiveStatistics(user: string): Promise<StatisticsView>;
  getCachedStatistics(user: string): Promise<CachedStatisticsView>;
  mayDecrypt(handle: string, principal: string): Promise<boolean>;
  userDecrypt(request: UserDecryptionRequest): Promise<SealedValue[]>;
}

export type EncryptedInput = Readonly<{
  handles: string[];
  inputProof: Uint8Array;
}>;

/**
 * Encoding library: turns plaintexts into handles plus one proof bound to
 * the target system and the submitter.
 */
export interface EncryptedInputPort {
  encrypt(params: { network: NetworkInfo; submitter: string; values: readonly number[] }): Promise<EncryptedInput>;
}
