import { describe, test, expect, vi, beforeEach, afterEach } from 'vitest';
import pino from 'pino';
import { MemoryMetricStore } from '@facility-pulse/database';
import { JobController, type RecurringTask } from '../snapshots/job-controller';
import { SnapshotGenerator, type GenerationResult } from '../snapshots/generator';
import { seededRandom } from '../snapshots/random';

const logger = pino({ level: 'silent' });
const INTERVAL = 2000;

const OK: GenerationResult = { status: 'success', executionId: 1, metricCount: 0, durationMs: 1, purged: 0 };

function deferred<T>() {
    const handle: { resolve: (value: T) => void } = { resolve: () => undefined };
    const promise = new Promise<T>((resolve) => {
        handle.resolve = resolve;
    });
    return { promise, resolve: (value: T) => handle.resolve(value) };
}

function instantTask() {
    const run = vi.fn(async (): Promise<GenerationResult> => OK);
    const task: RecurringTask = { run };
    return { task, run };
}

describe('JobController', () => {
    beforeEach(() => {
        vi.useFakeTimers();
    });

    afterEach(() => {
        vi.useRealTimers();
    });

    describe('control state machine', () => {
        test('from absent', () => {
            const controller = new JobController({ ...instantTask(), intervalMs: INTERVAL, logger });
            expect(controller.pause()).toBe('not_running');
            expect(controller.resume()).toBe('not_running');
            expect(controller.stop()).toBe('not_running');
            expect(controller.currentState).toBe('absent');
            expect(controller.start()).toBe('started');
            expect(controller.currentState).toBe('active');
        });

        test('from active', () => {
            const controller = new JobController({ ...instantTask(), intervalMs: INTERVAL, logger });
            controller.start();
            expect(controller.start()).toBe('already_running');
            expect(controller.resume()).toBe('already_running');
            expect(controller.currentState).toBe('active');
            expect(controller.pause()).toBe('paused');
            expect(controller.currentState).toBe('paused');
        });

        test('from paused', () => {
            const controller = new JobController({ ...instantTask(), intervalMs: INTERVAL, logger });
            controller.start();
            controller.pause();
            expect(controller.start()).toBe('already_running');
            expect(controller.currentState).toBe('paused');
            expect(controller.pause()).toBe('paused');
            expect(controller.currentState).toBe('paused');
            expect(controller.resume()).toBe('resumed');
            expect(controller.currentState).toBe('active');
        });

        test('stop from paused', () => {
            const controller = new JobController({ ...instantTask(), intervalMs: INTERVAL, logger });
            controller.start();
            controller.pause();
            expect(controller.stop()).toBe('stopped');
            expect(controller.currentState).toBe('absent');
        });

        test('stop twice returns stopped then not_running', () => {
            const controller = new JobController({ ...instantTask(), intervalMs: INTERVAL, logger });
            controller.start();
            expect(controller.stop()).toBe('stopped');
            expect(controller.stop()).toBe('not_running');
        });

        test('rejects a non-positive interval', () => {
            expect(() => new JobController({ ...instantTask(), intervalMs: 0, logger })).toThrow(RangeError);
        });
    });

    describe('status', () => {
        test('reports scheduler, job and pause flags', () => {
            const controller = new JobController({ ...instantTask(), intervalMs: INTERVAL, logger });
            expect(controller.status()).toEqual({ scheduler_running: false, job_exists: false, job_paused: null });

            controller.start();
            expect(controller.status()).toEqual({ scheduler_running: true, job_exists: true, job_paused: false });

            controller.pause();
            expect(controller.status()).toEqual({ scheduler_running: true, job_exists: true, job_paused: true });

            controller.stop();
            // the scheduler keeps running after the job is removed
            expect(controller.status()).toEqual({ scheduler_running: true, job_exists: false, job_paused: null });
        });

        test('never changes state', () => {
            const controller = new JobController({ ...instantTask(), intervalMs: INTERVAL, logger });
            controller.start();
            controller.pause();
            const before = controller.status();
            for (let i = 0; i < 5; i++) controller.status();
            expect(controller.status()).toEqual(before);
            expect(controller.currentState).toBe('paused');
            expect(vi.getTimerCount()).toBe(0);
        });
    });

    describe('firing', () => {
        test('start twice leaves exactly one timer', () => {
            const controller = new JobController({ ...instantTask(), intervalMs: INTERVAL, logger });
            expect(controller.start()).toBe('started');
            expect(controller.start()).toBe('already_running');
            expect(vi.getTimerCount()).toBe(1);
        });

        test('fires once per interval', async () => {
            const { task, run } = instantTask();
            const controller = new JobController({ task, intervalMs: INTERVAL, logger });
            controller.start();

            await vi.advanceTimersByTimeAsync(INTERVAL - 1);
            expect(run).not.toHaveBeenCalled();
            await vi.advanceTimersByTimeAsync(1);
            expect(run).toHaveBeenCalledTimes(1);
            await vi.advanceTimersByTimeAsync(INTERVAL * 2);
            expect(run).toHaveBeenCalledTimes(3);
            expect(vi.getTimerCount()).toBe(1);
        });

        test('pause holds firings until resume', async () => {
            const { task, run } = instantTask();
            const controller = new JobController({ task, intervalMs: INTERVAL, logger });
            controller.start();
            await vi.advanceTimersByTimeAsync(INTERVAL);
            controller.pause();

            await vi.advanceTimersByTimeAsync(INTERVAL * 5);
            expect(run).toHaveBeenCalledTimes(1);
            expect(vi.getTimerCount()).toBe(0);

            controller.resume();
            await vi.advanceTimersByTimeAsync(INTERVAL);
            expect(run).toHaveBeenCalledTimes(2);
        });

        test('a firing during an in-flight run is skipped, never overlapped', async () => {
            const gate = deferred<GenerationResult>();
            const run = vi.fn((): Promise<GenerationResult> => gate.promise);
            const controller = new JobController({ task: { run }, intervalMs: INTERVAL, logger });
            controller.start();

            await vi.advanceTimersByTimeAsync(INTERVAL);
            expect(run).toHaveBeenCalledTimes(1);
            expect(controller.isRunInFlight).toBe(true);

            await vi.advanceTimersByTimeAsync(INTERVAL * 2);
            expect(run).toHaveBeenCalledTimes(1);
            expect(controller.skippedFiringCount).toBe(2);

            gate.resolve(OK);
            await vi.advanceTimersByTimeAsync(0);
            expect(controller.isRunInFlight).toBe(false);

            await vi.advanceTimersByTimeAsync(INTERVAL);
            expect(run).toHaveBeenCalledTimes(2);
        });

        test('stop does not interrupt the in-flight run and returns immediately', async () => {
            const gate = deferred<GenerationResult>();
            const run = vi.fn((): Promise<GenerationResult> => gate.promise);
            const controller = new JobController({ task: { run }, intervalMs: INTERVAL, logger });
            controller.start();
            await vi.advanceTimersByTimeAsync(INTERVAL);

            expect(controller.stop()).toBe('stopped');
            expect(controller.isRunInFlight).toBe(true);
            expect(vi.getTimerCount()).toBe(0);

            gate.resolve(OK);
            await vi.advanceTimersByTimeAsync(0);
            expect(controller.isRunInFlight).toBe(false);

            await vi.advanceTimersByTimeAsync(INTERVAL * 5);
            expect(run).toHaveBeenCalledTimes(1);
        });

        test('restarting while a run is in flight does not overlap it', async () => {
            const gate = deferred<GenerationResult>();
            const run = vi.fn((): Promise<GenerationResult> => gate.promise);
            const controller = new JobController({ task: { run }, intervalMs: INTERVAL, logger });
            controller.start();
            await vi.advanceTimersByTimeAsync(INTERVAL);

            controller.stop();
            controller.start();
            await vi.advanceTimersByTimeAsync(INTERVAL);
            expect(run).toHaveBeenCalledTimes(1);
            expect(controller.skippedFiringCount).toBe(1);
            gate.resolve(OK);
        });

        test('a rejecting task does not stop the schedule', async () => {
            const run = vi.fn(async (): Promise<GenerationResult> => {
                throw new Error('boom');
            });
            const controller = new JobController({ task: { run }, intervalMs: INTERVAL, logger });
            controller.start();

            await vi.advanceTimersByTimeAsync(INTERVAL * 3);
            expect(run).toHaveBeenCalledTimes(3);
            expect(controller.currentState).toBe('active');
        });
    });

    describe('runNow and shutdown', () => {
        test('runNow joins an in-flight run', async () => {
            const gate = deferred<GenerationResult>();
            const run = vi.fn((): Promise<GenerationResult> => gate.promise);
            const controller = new JobController({ task: { run }, intervalMs: INTERVAL, logger });

            const first = controller.runNow();
            const second = controller.runNow();
            expect(run).toHaveBeenCalledTimes(1);

            gate.resolve(OK);
            await expect(first).resolves.toEqual(OK);
            await expect(second).resolves.toEqual(OK);
        });

        test('shutdown waits for the in-flight run and stops the scheduler', async () => {
            const gate = deferred<GenerationResult>();
            const run = vi.fn((): Promise<GenerationResult> => gate.promise);
            const controller = new JobController({ task: { run }, intervalMs: INTERVAL, logger });
            controller.start();
            await vi.advanceTimersByTimeAsync(INTERVAL);

            let finished = false;
            const done = controller.shutdown().then(() => {
                finished = true;
            });
            await vi.advanceTimersByTimeAsync(0);
            expect(finished).toBe(false);

            gate.resolve(OK);
            await done;
            expect(finished).toBe(true);
            expect(controller.status()).toEqual({ scheduler_running: false, job_exists: false, job_paused: null });
        });
    });

    test('drives the snapshot generator end to end', async () => {
        const store = new MemoryMetricStore();
        await store.seedReferenceData({
            facilities: [{ id: 'F-1', name: 'One', city: 'Turin', capacity: 20, is_active: true }],
            hvacStatuses: [{ code: 'healthy', description: 'Normal' }],
        });
        const generator = new SnapshotGenerator({ store, logger, retentionLimit: 2, random: seededRandom(5) });
        const controller = new JobController({ task: generator, intervalMs: INTERVAL, logger });

        controller.start();
        await vi.advanceTimersByTimeAsync(INTERVAL * 3);
        controller.stop();
        await controller.shutdown();

        expect(await store.countExecutions()).toBe(2);
        expect(await store.countMetrics()).toBe(2);
        const executions = await store.listExecutions(10);
        expect(executions.map((e) => e.status)).toEqual(['success', 'success']);
        expect(executions.map((e) => e.id)).toEqual([3, 2]);
    });
});
