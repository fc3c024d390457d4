export const SNAPSHOT_JOB_ID = 'snapshot_job' as const;

export type JobState = 'absent' | 'active' | 'paused';

export type JobStatusToken =
    | 'started'
    | 'already_running'
    | 'paused'
    | 'resumed'
    | 'stopped'
    | 'not_running';

export interface JobStatusResponse {
    status: JobStatusToken;
}

export interface JobStatusReport {
    scheduler_running: boolean;
    job_exists: boolean;
    // null when the job is not registered
    job_paused: boolean | null;
}
