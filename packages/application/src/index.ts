export * from './errors';
export * from './shared/ports';
export * from './shared/parseFields';
export * from './shared/KeyedSerialQueue';
export * from './ledger';
export * from './decryption';
