// src/services/journalPipeline.service.ts
import path from 'path';
import { Logger } from 'pino';
import { RunConfiguration } from '../config/types';
import { getErrorMessageAndStack } from '../utils/errorUtils';
import { JournalRecord } from '../types/journal.types';
import { CaptureOutcome, CaptureSource } from '../types/crawl.types';
import { JournalBatch, JournalSinkWriter, LocalFileStore, SinkWriteOutcome } from '../types/sink.types';
import { FinalizedRunStatistics } from '../types/statistics.types';
import { PageTransformer } from '../journal/pageTransformer';
import { RunStatistics } from '../journal/runStatistics';
import { fileTimestamp, serializeStatistics, statisticsFileName } from '../journal/journalSerializer';

export type RunStatus = 'completed' | 'no_input' | 'no_records' | 'aborted';

export interface RunReport {
    runId: string;
    status: RunStatus;
    statistics: FinalizedRunStatistics;
    captureOutcome: CaptureOutcome;
    sinkOutcomes: SinkWriteOutcome[];
    /** Every file written by the sinks, local or remote. */
    artifacts: string[];
    statisticsPath: string | null;
}

export interface JournalPipelineDependencies {
    runId: string;
    source: CaptureSource;
    transformer: PageTransformer;
    sinks: JournalSinkWriter[];
    localStore: LocalFileStore;
    logger: Logger;
    now?: () => Date;
}

export function compareRecordOrder(a: JournalRecord, b: JournalRecord): number {
    return a.source_page_sequence - b.source_page_sequence || a.extraction_index - b.extraction_index;
}

/**
 * One harvesting run: drain the capture source, transform each page as it
 * arrives, hand the frozen record set to every sink in turn, and write the
 * statistics artifact.
 */
export class JournalPipeline {
    private readonly runId: string;
    private readonly source: CaptureSource;
    private readonly transformer: PageTransformer;
    private readonly sinks: JournalSinkWriter[];
    private readonly localStore: LocalFileStore;
    private readonly logger: Logger;
    private readonly now: () => Date;
    private hasRun = false;

    constructor(private readonly config: RunConfiguration, dependencies: JournalPipelineDependencies) {
        this.runId = dependencies.runId;
        this.source = dependencies.source;
        this.transformer = dependencies.transformer;
        this.sinks = dependencies.sinks;
        this.localStore = dependencies.localStore;
        this.logger = dependencies.logger.child({ service: 'JournalPipeline', runId: dependencies.runId });
        this.now = dependencies.now ?? (() => new Date());
    }

    private get sourceFolder(): string {
        const { input } = this.config;
        return input.kind === 'archive' ? input.directory : input.archiveDirectory ?? input.portalUrl;
    }

    public async run(): Promise<RunReport> {
        if (this.hasRun) {
            throw new Error('A pipeline runs once; create a new one for the next run');
        }
        this.hasRun = true;

        const startedAt = this.now();
        const timestamp = fileTimestamp(startedAt);
        const statistics = new RunStatistics();
        this.sinks.forEach(sink => statistics.registerSink(sink.name));

        this.logger.info({ event: 'run_start', source: this.source.description, sinks: this.sinks.map(s => s.name) }, `Run ${this.runId} started.`);

        const { records, captureOutcome } = await this.collectRecords(statistics);
        captureOutcome.errors.forEach(error => statistics.recordError(error));

        let status: RunStatus;
        if (captureOutcome.status === 'aborted') {
            status = 'aborted';
        } else if (captureOutcome.pagesCaptured === 0) {
            status = 'no_input';
        } else if (records.length === 0) {
            status = 'no_records';
        } else {
            status = 'completed';
        }

        const sinkOutcomes: SinkWriteOutcome[] = [];
        if (records.length === 0) {
            const condition = captureOutcome.pagesCaptured === 0 ? 'No pages were captured' : 'No records were extracted';
            statistics.recordError(`${condition}; sinks were not invoked.`);
            this.logger.warn({ event: 'run_empty_input', status, pagesCaptured: captureOutcome.pagesCaptured }, `${condition}; skipping sinks.`);
        } else {
            const batch: JournalBatch = Object.freeze({
                records: Object.freeze(records.sort(compareRecordOrder).map(record => Object.freeze(record))),
                extractionDate: startedAt,
                sourceFolder: this.sourceFolder,
                fileTimestamp: timestamp,
            });
            for (const sink of this.sinks) {
                const outcome = await this.writeSink(sink, batch);
                statistics.recordSinkOutcome(outcome);
                sinkOutcomes.push(outcome);
            }
        }

        const finalized = statistics.finalize();
        const statisticsPath = await this.writeStatistics(startedAt, timestamp, finalized);

        this.logger.info({
            event: 'run_finished',
            status,
            totalPages: finalized.total_pages,
            successfulExtractions: finalized.successful_extractions,
            failedExtractions: finalized.failed_extractions,
            errorCount: finalized.errors.length,
        }, `Run ${this.runId} finished: ${status}.`);

        return {
            runId: this.runId,
            status,
            statistics: finalized,
            captureOutcome,
            sinkOutcomes,
            artifacts: sinkOutcomes.flatMap(outcome => outcome.locations),
            statisticsPath,
        };
    }

    // Each capture is transformed as it arrives and not kept afterwards.
    private async collectRecords(statistics: RunStatistics): Promise<{ records: JournalRecord[]; captureOutcome: CaptureOutcome }> {
        const records: JournalRecord[] = [];
        const generator = this.source.captures();
        let pagesSeen = 0;
        try {
            for (; ;) {
                const step = await generator.next();
                if (step.done) {
                    return { records, captureOutcome: step.value };
                }
                pagesSeen += 1;
                const report = this.transformer.transform(step.value);
                statistics.recordPage(report);
                records.push(...report.records);
            }
        } catch (error) {
            const { message, stack } = getErrorMessageAndStack(error);
            this.logger.error({ event: 'capture_source_failed', err: { message, stack } }, `Capture source failed: ${message}`);
            return {
                records,
                captureOutcome: {
                    status: 'aborted',
                    reason: 'navigation_failure',
                    pagesCaptured: pagesSeen,
                    step: 'capture_source',
                    message,
                    diagnostics: [],
                    errors: [`Capture source failed after ${pagesSeen} page(s): ${message}`],
                },
            };
        }
    }

    private async writeSink(sink: JournalSinkWriter, batch: JournalBatch): Promise<SinkWriteOutcome> {
        try {
            return await sink.write(batch);
        } catch (error) {
            const { message } = getErrorMessageAndStack(error);
            this.logger.error({ event: 'sink_write_threw', sink: sink.name, err: { message } }, `Sink ${sink.name} threw: ${message}`);
            return { sink: sink.name, ok: false, locations: [], errors: [message] };
        }
    }

    private async writeStatistics(startedAt: Date, timestamp: string, finalized: FinalizedRunStatistics): Promise<string | null> {
        const filePath = path.join(this.config.outputDirectory, statisticsFileName(timestamp));
        const result = await this.localStore.writeLocal(filePath, serializeStatistics(startedAt, finalized));
        if (!result.ok) {
            this.logger.error({ event: 'statistics_write_failed', filePath, error: result.error }, 'Could not write the statistics artifact.');
            return null;
        }
        this.logger.info({ event: 'statistics_written', filePath }, 'Statistics artifact written.');
        return result.location;
    }
}
