export * from './constants';
export * from './TrustLedger';
export * from './events';
export * from './vos/UserAddress';
export * from './vos/CiphertextHandle';
export * from './vos/EncryptedType';
export * from './vos/StatisticsSnapshot';
