export * from './types';
export * from './errors';
export * from './httpTransport';
export * from './RevealSession';
export * from './ScoreSubmitter';
export * from './revealAll';
