// src/journal/journalSerializer.ts
import { Readable, Writable } from 'stream';
import { pipeline as streamPipeline } from 'stream/promises';
import { ParserOptions, Transform as Json2CsvTransform } from '@json2csv/node';
import { format } from 'date-fns';
import { JOURNAL_RECORD_FIELDS, JournalRecord } from '../types/journal.types';
import { JournalBatch } from '../types/sink.types';
import { FinalizedRunStatistics, StatisticsArtifact } from '../types/statistics.types';

export const CSV_FILE_PREFIX = 'journals_data';
export const STATISTICS_FILE_PREFIX = 'extraction_stats';

export function fileTimestamp(date: Date): string {
    return format(date, 'yyyyMMdd_HHmmss');
}

/** `YYYY/MM/DD` partition of the remote destination. */
export function datePartition(date: Date): string {
    return format(date, 'yyyy/MM/dd');
}

export const csvFileName = (timestamp: string): string => `${CSV_FILE_PREFIX}_${timestamp}.csv`;
export const jsonFileName = (timestamp: string): string => `${CSV_FILE_PREFIX}_${timestamp}.json`;
export const statisticsFileName = (timestamp: string): string => `${STATISTICS_FILE_PREFIX}_${timestamp}.json`;

/**
 * Header row of the record fields in schema order, then one row per record.
 */
export async function serializeJournalsCsv(records: readonly JournalRecord[]): Promise<Buffer> {
    const chunks: Buffer[] = [];
    const csvOptions: ParserOptions<JournalRecord, JournalRecord> = {
        fields: [...JOURNAL_RECORD_FIELDS],
        defaultValue: '',
    };
    const csvTransform = new Json2CsvTransform<JournalRecord, JournalRecord>(csvOptions, {}, { objectMode: true });
    const collector = new Writable({
        write(chunk: unknown, _encoding, callback) {
            chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk), 'utf8'));
            callback();
        },
    });

    await streamPipeline(Readable.from(records), csvTransform, collector);
    return Buffer.concat(chunks);
}

export function serializeJournalsJson(batch: JournalBatch): Buffer {
    const document = {
        metadata: {
            total_journals: batch.records.length,
            extraction_date: batch.extractionDate.toISOString(),
            source_folder: batch.sourceFolder,
        },
        journals: batch.records,
    };
    return Buffer.from(JSON.stringify(document, null, 2), 'utf8');
}

export function serializeStatistics(extractionDate: Date, statistics: FinalizedRunStatistics): Buffer {
    const artifact: StatisticsArtifact = {
        extraction_date: extractionDate.toISOString(),
        statistics,
    };
    return Buffer.from(JSON.stringify(artifact, null, 2), 'utf8');
}
