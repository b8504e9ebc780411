// src/services/sinkWriter.service.ts
import path from 'path';
import { Logger } from 'pino';
import { OutputFormat, RunConfiguration } from '../config/types';
import { getErrorMessageAndStack } from '../utils/errorUtils';
import {
    JournalBatch,
    JournalSinkWriter,
    LocalFileStore,
    RemoteFileStore,
    SinkName,
    SinkResult,
    SinkWriteOutcome,
} from '../types/sink.types';
import {
    csvFileName,
    datePartition,
    jsonFileName,
    serializeJournalsCsv,
    serializeJournalsJson,
} from '../journal/journalSerializer';

function outcomeOf(sink: SinkName, results: SinkResult[]): SinkWriteOutcome {
    const locations: string[] = [];
    const errors: string[] = [];
    for (const result of results) {
        if (result.ok) {
            locations.push(result.location);
        } else {
            errors.push(`${result.location}: ${result.error}`);
        }
    }
    return { sink, ok: errors.length === 0, locations, errors };
}

function failedOutcome(sink: SinkName, error: unknown): SinkWriteOutcome {
    return { sink, ok: false, locations: [], errors: [getErrorMessageAndStack(error).message] };
}

export class LocalCsvSinkWriter implements JournalSinkWriter {
    public readonly name = 'local_csv' as const;
    private readonly logger: Logger;

    constructor(private readonly fileStore: LocalFileStore, private readonly outputDirectory: string, parentLogger: Logger) {
        this.logger = parentLogger.child({ service: 'LocalCsvSinkWriter' });
    }

    public async write(batch: JournalBatch): Promise<SinkWriteOutcome> {
        const filePath = path.join(this.outputDirectory, csvFileName(batch.fileTimestamp));
        try {
            const result = await this.fileStore.writeLocal(filePath, await serializeJournalsCsv(batch.records));
            this.logger.info({ event: 'sink_write_finished', sink: this.name, filePath, ok: result.ok, recordCount: batch.records.length }, `CSV sink: ${result.ok ? 'written' : 'failed'}.`);
            return outcomeOf(this.name, [result]);
        } catch (error) {
            this.logger.error({ event: 'sink_write_error', sink: this.name, err: getErrorMessageAndStack(error) }, 'CSV sink failed.');
            return failedOutcome(this.name, error);
        }
    }
}

export class LocalJsonSinkWriter implements JournalSinkWriter {
    public readonly name = 'local_json' as const;
    private readonly logger: Logger;

    constructor(private readonly fileStore: LocalFileStore, private readonly outputDirectory: string, parentLogger: Logger) {
        this.logger = parentLogger.child({ service: 'LocalJsonSinkWriter' });
    }

    public async write(batch: JournalBatch): Promise<SinkWriteOutcome> {
        const filePath = path.join(this.outputDirectory, jsonFileName(batch.fileTimestamp));
        try {
            const result = await this.fileStore.writeLocal(filePath, serializeJournalsJson(batch));
            this.logger.info({ event: 'sink_write_finished', sink: this.name, filePath, ok: result.ok, recordCount: batch.records.length }, `JSON sink: ${result.ok ? 'written' : 'failed'}.`);
            return outcomeOf(this.name, [result]);
        } catch (error) {
            this.logger.error({ event: 'sink_write_error', sink: this.name, err: getErrorMessageAndStack(error) }, 'JSON sink failed.');
            return failedOutcome(this.name, error);
        }
    }
}

/**
 * Uploads the CSV and/or JSON payloads into `<root>/<YYYY>/<MM>/<DD>/`.
 * Nothing is uploaded when the dated directory cannot be created.
 */
export class HdfsSinkWriter implements JournalSinkWriter {
    public readonly name = 'hdfs' as const;
    private readonly logger: Logger;

    constructor(
        private readonly remoteStore: RemoteFileStore,
        private readonly rootPath: string,
        private readonly format: OutputFormat,
        parentLogger: Logger,
    ) {
        this.logger = parentLogger.child({ service: 'HdfsSinkWriter' });
    }

    public async write(batch: JournalBatch): Promise<SinkWriteOutcome> {
        const remoteDir = path.posix.join(this.rootPath, datePartition(batch.extractionDate));
        try {
            const dirResult = await this.remoteStore.ensureRemoteDir(remoteDir);
            if (!dirResult.ok) {
                this.logger.error({ event: 'hdfs_directory_unavailable', remoteDir, error: dirResult.error }, 'Remote directory unavailable; skipping uploads.');
                return outcomeOf(this.name, [dirResult]);
            }

            const results: SinkResult[] = [];
            if (this.format === 'csv' || this.format === 'both') {
                const csv = await serializeJournalsCsv(batch.records);
                results.push(await this.remoteStore.writeRemote(path.posix.join(remoteDir, csvFileName(batch.fileTimestamp)), csv));
            }
            if (this.format === 'json' || this.format === 'both') {
                results.push(await this.remoteStore.writeRemote(path.posix.join(remoteDir, jsonFileName(batch.fileTimestamp)), serializeJournalsJson(batch)));
            }
            const outcome = outcomeOf(this.name, results);
            this.logger.info({ event: 'sink_write_finished', sink: this.name, remoteDir, uploaded: outcome.locations.length, failed: outcome.errors.length }, `HDFS sink: ${outcome.locations.length} file(s) uploaded.`);
            return outcome;
        } catch (error) {
            this.logger.error({ event: 'sink_write_error', sink: this.name, err: getErrorMessageAndStack(error) }, 'HDFS sink failed.');
            return failedOutcome(this.name, error);
        }
    }
}

export interface SinkStores {
    localStore: LocalFileStore;
    remoteStore: RemoteFileStore | null;
}

/**
 * Writers for the sinks a run configuration selects, in the order they run.
 */
export function createSinkWriters(config: RunConfiguration, stores: SinkStores, parentLogger: Logger): JournalSinkWriter[] {
    const writers: JournalSinkWriter[] = [];
    if (config.outputFormat === 'csv' || config.outputFormat === 'both') {
        writers.push(new LocalCsvSinkWriter(stores.localStore, config.outputDirectory, parentLogger));
    }
    if (config.outputFormat === 'json' || config.outputFormat === 'both') {
        writers.push(new LocalJsonSinkWriter(stores.localStore, config.outputDirectory, parentLogger));
    }
    if (config.remote.enabled) {
        if (!stores.remoteStore) {
            throw new Error('Remote sink is enabled but no remote file store was provided');
        }
        writers.push(new HdfsSinkWriter(stores.remoteStore, config.remote.rootPath, config.outputFormat, parentLogger));
    }
    return writers;
}
