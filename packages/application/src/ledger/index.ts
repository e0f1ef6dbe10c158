export * from './commands';
export type * from './ports';
export * from './services/Accumulator';
export * from './services/GrantingCompute';
export * from './TrustLedgerCommandHandler';
export * from './TrustLedgerQueryHandler';
