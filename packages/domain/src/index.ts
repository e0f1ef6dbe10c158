// Shared kernel
export * from './shared/Assert';
export * from './shared/AggregateRoot';
export * from './shared/DomainEvent';
export * from './shared/Entity';
export * from './shared/vos/ValueObject';
export * from './shared/vos/AggregateId';
export * from './shared/vos/ActorId';
export * from './shared/vos/EventId';
export * from './shared/vos/Timestamp';
export * from './utils/uuid';

// Trust ledger
export * from './ledger';
