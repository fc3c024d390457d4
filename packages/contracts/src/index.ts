export const CONTRACT_VERSION = '1.0.0';

export * from './snapshots-v1';
export * from './jobs';
export * from './auth';
export * from './errors';
