import type { BaseLogger, Logger } from 'pino';
import type { MetricStore } from '@facility-pulse/database';
import type { AppConfig } from '../config';
import { SnapshotGenerator } from './generator';
import { JobController } from './job-controller';
import { mathRandom, seededRandom } from './random';

export { SnapshotGenerator, occupancyRange } from './generator';
export type { GenerationResult, SnapshotGeneratorOptions } from './generator';
export { JobController } from './job-controller';
export type { JobControllerOptions, RecurringTask } from './job-controller';
export { seededRandom, mathRandom } from './random';
export type { RandomSource } from './random';

/**
 * Wires a generator to a controller using the snapshot section of the config.
 */
export function createSnapshotJob(
    store: MetricStore,
    snapshots: AppConfig['snapshots'],
    logger: Logger,
): { generator: SnapshotGenerator; controller: JobController } {
    const generatorLogger: BaseLogger = logger.child({ module: 'snapshot-generator' });
    const generator = new SnapshotGenerator({
        store,
        logger: generatorLogger,
        retentionLimit: snapshots.retentionLimit,
        random: snapshots.randomSeed !== undefined ? seededRandom(snapshots.randomSeed) : mathRandom,
    });

    const controller = new JobController({
        task: generator,
        intervalMs: snapshots.intervalMs,
        logger: logger.child({ module: 'snapshot-job' }),
    });

    return { generator, controller };
}
