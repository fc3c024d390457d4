export const SNAPSHOT_RETENTION_LIMIT = 50;

export interface RetentionCandidate {
    id: number;
    execution_time: Date;
}

/**
 * Newest first by execution_time. Executions sharing a timestamp are ordered
 * by id, the higher (later inserted) id counting as newer.
 */
export function compareNewestFirst(a: RetentionCandidate, b: RetentionCandidate): number {
    const byTime = b.execution_time.getTime() - a.execution_time.getTime();
    return byTime !== 0 ? byTime : b.id - a.id;
}

/**
 * Ids of every execution beyond the `limit` most recent ones.
 */
export function selectExpiredExecutions(rows: readonly RetentionCandidate[], limit: number): number[] {
    if (!Number.isInteger(limit) || limit < 0) {
        throw new RangeError(`Retention limit must be a non-negative integer, got ${limit}`);
    }
    if (rows.length <= limit) return [];

    return [...rows]
        .sort(compareNewestFirst)
        .slice(limit)
        .map((row) => row.id);
}
