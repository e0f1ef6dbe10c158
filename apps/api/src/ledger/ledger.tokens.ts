export const TRUST_LEDGER_SERVICES = Symbol('TRUST_LEDGER_SERVICES');
export const LEDGER_CLOCK = Symbol('LEDGER_CLOCK');
