export * from './types';
export * from './schema';
export * from './retention';
export * from './seedData';
export { MemoryMetricStore } from './memoryMetricStore';
export { PostgresMetricStore } from './postgresMetricStore';
