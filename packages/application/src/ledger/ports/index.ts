export type * from './TrustLedgerRepositoryPort';
export type * from './TrustLedgerReadModelPort';
export type * from './EncryptedComputePort';
export type * from './InputVerifierPort';
export type * from './CapabilityDirectoryPort';
