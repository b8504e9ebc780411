// src/types/journal.types.ts
import { z } from 'zod';

/**
 * Closed schema of one normalized catalog entry. Key order is the column order
 * of the CSV artifact and the key order of the JSON artifact.
 */
export const journalRecordSchema = z.object({
    journal_id: z.string().regex(/^\d*$/),
    journal_name: z.string(),
    profile_url: z.string(),
    google_scholar_url: z.string(),
    website_url: z.string(),
    editor_url: z.string(),
    affiliation: z.string(),
    affiliation_url: z.string(),
    p_issn: z.string().regex(/^\d*$/),
    e_issn: z.string().regex(/^\d*$/),
    subject_area: z.string(),
    accreditation: z.string().regex(/^(S\d+)?$/),
    is_scopus_indexed: z.boolean(),
    is_garuda_indexed: z.boolean(),
    garuda_url: z.string(),
    impact_score: z.string(),
    h5_index: z.string(),
    citations_5yr: z.string(),
    citations_total: z.string(),
    cover_image_url: z.string(),
    source_page_sequence: z.number().int().positive(),
    extraction_index: z.number().int().positive(),
    extracted_at: z.string().datetime(),
}).strict();

export type JournalRecord = z.infer<typeof journalRecordSchema>;

export type JournalRecordField = keyof JournalRecord;

export const JOURNAL_RECORD_FIELDS: readonly JournalRecordField[] = journalRecordSchema.keyof().options;

/**
 * One snapshot of a rendered listing page.
 */
export interface RawPageCapture {
    readonly sequenceNumber: number;
    readonly markup: string;
    readonly capturedAt: Date;
}

export function createRawPageCapture(sequenceNumber: number, markup: string, capturedAt: Date = new Date()): RawPageCapture {
    if (!Number.isInteger(sequenceNumber) || sequenceNumber < 1) {
        throw new RangeError(`Capture sequence number must be a positive integer, got ${sequenceNumber}`);
    }
    return Object.freeze({ sequenceNumber, markup, capturedAt: new Date(capturedAt.getTime()) });
}

export interface ExtractionContext {
    sourcePageSequence: number;
    /** 1-based position of the fragment within its page. */
    extractionIndex: number;
    now?: () => Date;
}

export interface FieldWarning {
    field: string;
    message: string;
}

export type ExtractionFailureReason =
    | { kind: 'fragment_unreadable'; message: string }
    | { kind: 'schema_violation'; message: string };

export type ExtractionOutcome =
    | { ok: true; record: JournalRecord; warnings: FieldWarning[] }
    | { ok: false; reason: ExtractionFailureReason };

export type PageError =
    | { kind: 'fragment_extraction'; pageSequence: number; fragmentIndex: number; message: string }
    | { kind: 'page_parse'; pageSequence: number; message: string };

export interface PageTransformReport {
    pageSequence: number;
    candidateCount: number;
    records: JournalRecord[];
    pageErrors: PageError[];
}

export function describePageError(error: PageError): string {
    switch (error.kind) {
        case 'fragment_extraction':
            return `Fragment #${error.fragmentIndex} on page ${error.pageSequence} failed: ${error.message}`;
        case 'page_parse':
            return `Page ${error.pageSequence} could not be parsed: ${error.message}`;
    }
}
