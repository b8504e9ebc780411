// src/journal/runStatistics.ts
import { describePageError, PageTransformReport } from '../types/journal.types';
import { SinkName, SinkWriteOutcome } from '../types/sink.types';
import { FinalizedRunStatistics, SinkCounters } from '../types/statistics.types';

/**
 * Per-run accumulator, mutated only by the pipeline that owns it.
 * `finalize()` freezes it; any later mutation throws.
 */
export class RunStatistics {
    private totalPages = 0;
    private totalCandidates = 0;
    private successfulExtractions = 0;
    private failedExtractions = 0;
    private readonly sinkSuccesses: SinkCounters = {};
    private readonly sinkFailures: SinkCounters = {};
    private readonly errors: string[] = [];
    private snapshot: FinalizedRunStatistics | null = null;

    get isFinalized(): boolean {
        return this.snapshot !== null;
    }

    private assertMutable(): void {
        if (this.snapshot) {
            throw new Error('Run statistics have been finalized');
        }
    }

    /** Counters of a configured sink start at zero, so they show up even when it never runs. */
    public registerSink(sink: SinkName): void {
        this.assertMutable();
        this.sinkSuccesses[sink] ??= 0;
        this.sinkFailures[sink] ??= 0;
    }

    public recordPage(report: PageTransformReport): void {
        this.assertMutable();
        this.totalPages += 1;
        this.totalCandidates += report.candidateCount;
        this.successfulExtractions += report.records.length;
        for (const pageError of report.pageErrors) {
            if (pageError.kind === 'fragment_extraction') {
                this.failedExtractions += 1;
            }
            this.errors.push(describePageError(pageError));
        }
    }

    public recordSinkOutcome(outcome: SinkWriteOutcome): void {
        this.assertMutable();
        this.sinkSuccesses[outcome.sink] = (this.sinkSuccesses[outcome.sink] ?? 0) + outcome.locations.length;
        this.sinkFailures[outcome.sink] = (this.sinkFailures[outcome.sink] ?? 0) + outcome.errors.length;
        for (const error of outcome.errors) {
            this.errors.push(`Sink ${outcome.sink} failed: ${error}`);
        }
    }

    public recordError(description: string): void {
        this.assertMutable();
        this.errors.push(description);
    }

    public finalize(): FinalizedRunStatistics {
        if (!this.snapshot) {
            this.snapshot = Object.freeze({
                total_pages: this.totalPages,
                total_candidates: this.totalCandidates,
                successful_extractions: this.successfulExtractions,
                failed_extractions: this.failedExtractions,
                sink_successes: Object.freeze({ ...this.sinkSuccesses }),
                sink_failures: Object.freeze({ ...this.sinkFailures }),
                errors: Object.freeze([...this.errors]),
            });
        }
        return this.snapshot;
    }
}
