export * from './entities/file-record';
export * from './entities/snapshot';
export * from './entities/sync-action';
export * from './entities/sync-pair';
