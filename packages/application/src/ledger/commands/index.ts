export * from './RecordTrustEvent';
export * from './ValidateBatch';
export * from './ViewStatistics';
