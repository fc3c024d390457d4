import type { BaseLogger } from 'pino';
import {
    SNAPSHOT_JOB_ID,
    type JobState,
    type JobStatusReport,
    type JobStatusToken,
} from '@facility-pulse/contracts';
import type { GenerationResult } from './generator';

/** Anything the controller can fire. `run()` is expected never to reject. */
export interface RecurringTask {
    run(): Promise<GenerationResult>;
}

export interface JobControllerOptions {
    task: RecurringTask;
    intervalMs: number;
    logger: BaseLogger;
    jobId?: string;
}

/**
 * Owns the single named recurring job that drives snapshot generation.
 *
 * Control calls only change what fires next: they never await or cancel a
 * run that is already in flight. Runs are single-flight; a firing that lands
 * while the previous run is still going is skipped.
 */
export class JobController {
    readonly jobId: string;
    private readonly task: RecurringTask;
    private readonly intervalMs: number;
    private readonly logger: BaseLogger;

    private state: JobState = 'absent';
    private schedulerRunning = false;
    private timer: NodeJS.Timeout | null = null;
    private inFlight: Promise<GenerationResult> | null = null;
    private skippedFirings = 0;

    constructor(opts: JobControllerOptions) {
        if (!Number.isInteger(opts.intervalMs) || opts.intervalMs <= 0) {
            throw new RangeError(`intervalMs must be a positive integer, got ${opts.intervalMs}`);
        }
        this.task = opts.task;
        this.intervalMs = opts.intervalMs;
        this.logger = opts.logger;
        this.jobId = opts.jobId ?? SNAPSHOT_JOB_ID;
    }

    start(): JobStatusToken {
        if (this.state !== 'absent') return 'already_running';

        this.state = 'active';
        this.schedulerRunning = true;
        this.schedule();
        this.logger.info({ jobId: this.jobId, intervalMs: this.intervalMs }, 'Job started');
        return 'started';
    }

    pause(): JobStatusToken {
        if (this.state === 'absent') return 'not_running';

        this.state = 'paused';
        this.clearTimer();
        this.logger.info({ jobId: this.jobId }, 'Job paused');
        return 'paused';
    }

    resume(): JobStatusToken {
        if (this.state === 'absent') return 'not_running';
        if (this.state === 'active') return 'already_running';

        this.state = 'active';
        this.schedule();
        this.logger.info({ jobId: this.jobId }, 'Job resumed');
        return 'resumed';
    }

    stop(): JobStatusToken {
        if (this.state === 'absent') return 'not_running';

        this.state = 'absent';
        this.clearTimer();
        this.logger.info({ jobId: this.jobId, runInFlight: this.inFlight !== null }, 'Job stopped');
        return 'stopped';
    }

    status(): JobStatusReport {
        const exists = this.state !== 'absent';
        return {
            scheduler_running: this.schedulerRunning,
            job_exists: exists,
            // paused means no next firing is scheduled
            job_paused: exists ? this.state === 'paused' : null,
        };
    }

    get currentState(): JobState {
        return this.state;
    }

    get isRunInFlight(): boolean {
        return this.inFlight !== null;
    }

    get skippedFiringCount(): number {
        return this.skippedFirings;
    }

    /**
     * Runs the task once outside the schedule. Joins the in-flight run
     * instead of starting a second one.
     */
    runNow(): Promise<GenerationResult> {
        return this.inFlight ?? this.launch();
    }

    /** Stops the job and the scheduler, then waits for any in-flight run. */
    async shutdown(): Promise<void> {
        this.stop();
        this.schedulerRunning = false;
        if (this.inFlight) {
            await this.inFlight;
        }
    }

    // ─── Internals ───────────────────────────────────────────────────────────

    private schedule(): void {
        this.clearTimer();
        this.timer = setTimeout(() => this.fire(), this.intervalMs);
    }

    private fire(): void {
        this.timer = null;
        if (this.state !== 'active') return;

        // Next firing is set up before this one does any work: fixed rate, one timer.
        this.schedule();

        if (this.inFlight) {
            this.skippedFirings++;
            this.logger.warn({ jobId: this.jobId }, 'Previous run still in flight; firing skipped');
            return;
        }
        void this.launch();
    }

    private launch(): Promise<GenerationResult> {
        const run = this.task
            .run()
            .catch((err: unknown): GenerationResult => {
                const error = err instanceof Error ? err : new Error(String(err));
                this.logger.error({ err: error, jobId: this.jobId }, 'Recurring task rejected');
                return { status: 'failed', executionId: null, error };
            })
            .finally(() => {
                this.inFlight = null;
            });
        this.inFlight = run;
        return run;
    }

    private clearTimer(): void {
        if (this.timer) {
            clearTimeout(this.timer);
            this.timer = null;
        }
    }
}
