export * from './BaseCommand';
export * from './BaseCommandHandler';
export type * from './CryptoServicePort';
export type * from './EventBusPort';
export * from './Option';
