// src/journal/pageTransformer.ts
import { Logger } from 'pino';
import { MarkupFragment, parseMarkupDocument } from '../utils/markupFragment';
import { getErrorMessageAndStack } from '../utils/errorUtils';
import {
    ExtractionContext,
    ExtractionOutcome,
    JournalRecord,
    PageError,
    PageTransformReport,
    RawPageCapture,
} from '../types/journal.types';
import { extractJournalRecord } from './recordExtractor';
import { CANDIDATE_ENTRY } from './listingMarkers';

export type RecordExtractorFn = (entry: MarkupFragment, context: ExtractionContext) => ExtractionOutcome;

export interface PageTransformerOptions {
    extract?: RecordExtractorFn;
    now?: () => Date;
}

/**
 * Turns one page capture into records plus per-page errors. A failing entry is
 * recorded and skipped; the entries after it are still extracted.
 */
export class PageTransformer {
    private readonly extract: RecordExtractorFn;
    private readonly now?: () => Date;
    private readonly logger: Logger;

    constructor(parentLogger: Logger, options: PageTransformerOptions = {}) {
        this.extract = options.extract ?? extractJournalRecord;
        this.now = options.now;
        this.logger = parentLogger.child({ service: 'PageTransformer' });
    }

    public transform(capture: RawPageCapture): PageTransformReport {
        const pageSequence = capture.sequenceNumber;
        const logger = this.logger.child({ serviceMethod: 'PageTransformer.transform', pageSequence });

        let entries: MarkupFragment[];
        try {
            entries = parseMarkupDocument(capture.markup).findAll(CANDIDATE_ENTRY);
        } catch (error) {
            const { message, stack } = getErrorMessageAndStack(error);
            logger.error({ event: 'page_parse_failed', err: { message, stack } }, `Page ${pageSequence} could not be parsed: ${message}`);
            return { pageSequence, candidateCount: 0, records: [], pageErrors: [{ kind: 'page_parse', pageSequence, message }] };
        }

        if (entries.length === 0) {
            logger.warn({ event: 'page_without_candidates' }, `Page ${pageSequence} contains no candidate entries.`);
        }

        const records: JournalRecord[] = [];
        const pageErrors: PageError[] = [];

        entries.forEach((entry, position) => {
            const extractionIndex = position + 1;
            let outcome: ExtractionOutcome;
            try {
                outcome = this.extract(entry, { sourcePageSequence: pageSequence, extractionIndex, now: this.now });
            } catch (error) {
                outcome = { ok: false, reason: { kind: 'fragment_unreadable', message: getErrorMessageAndStack(error).message } };
            }

            if (outcome.ok) {
                records.push(outcome.record);
                for (const warning of outcome.warnings) {
                    logger.debug({ event: 'field_lookup_degraded', extractionIndex, ...warning }, `Entry #${extractionIndex}: ${warning.field} fell back to defaults.`);
                }
                return;
            }

            pageErrors.push({ kind: 'fragment_extraction', pageSequence, fragmentIndex: extractionIndex, message: outcome.reason.message });
            logger.warn({ event: 'fragment_extraction_failed', extractionIndex, reason: outcome.reason }, `Entry #${extractionIndex} on page ${pageSequence} failed: ${outcome.reason.message}`);
        });

        logger.info({
            event: 'page_transformed',
            candidateCount: entries.length,
            recordCount: records.length,
            errorCount: pageErrors.length,
        }, `Page ${pageSequence}: ${records.length}/${entries.length} entries extracted.`);

        return { pageSequence, candidateCount: entries.length, records, pageErrors };
    }
}
