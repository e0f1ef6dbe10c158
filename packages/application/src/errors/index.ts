export * from './ApplicationError';
export * from './ValidationError';
export * from './ledgerErrors';
