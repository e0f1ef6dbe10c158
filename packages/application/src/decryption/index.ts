export * from './authorization';
export * from './plaintextCodec';
export * from './sealedValue';
export type * from './types';
export type * from './ports/DecryptionOraclePort';
export * from './UserDecryptionHandler';
