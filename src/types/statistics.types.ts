// src/types/statistics.types.ts
import { SinkName } from './sink.types';

export type SinkCounters = Partial<Record<SinkName, number>>;

/**
 * Read-only snapshot of a run's statistics, serialized as the `statistics`
 * object of the statistics artifact.
 */
export interface FinalizedRunStatistics {
    readonly total_pages: number;
    readonly total_candidates: number;
    readonly successful_extractions: number;
    readonly failed_extractions: number;
    readonly sink_successes: Readonly<SinkCounters>;
    readonly sink_failures: Readonly<SinkCounters>;
    readonly errors: readonly string[];
}

export interface StatisticsArtifact {
    extraction_date: string;
    statistics: FinalizedRunStatistics;
}
