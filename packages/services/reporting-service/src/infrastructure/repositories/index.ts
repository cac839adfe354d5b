export * from './InMemoryRecordStore';
export * from './DrizzleRecordStore';
