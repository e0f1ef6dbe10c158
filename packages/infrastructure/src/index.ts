export * from './crypto/NodeCryptoService';
export * from './crypto/eciesEnvelope';
export type * from './executor/CiphertextStorePort';
export * from './executor/InMemoryCiphertextStore';
export * from './executor/LocalFheExecutor';
export * from './input/inputProof';
export * from './input/EncryptedInputEncoder';
export * from './input/InputProofVerifier';
export * from './capabilities/InMemoryCapabilityDirectory';
export * from './ledger/InMemoryTrustLedgerStore';
export * from './bus/InMemoryEventBus';
export * from './wiring';
