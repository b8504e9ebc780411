// src/journal/pageTransformer.test.ts
import pino from 'pino';
import { createRawPageCapture } from '../types/journal.types';
import { PageTransformer, RecordExtractorFn } from './pageTransformer';
import { extractJournalRecord } from './recordExtractor';
import { entryMarkup, listingPageMarkup } from './__fixtures__/listingMarkup';

const logger = pino({ level: 'silent' });
const fixedNow = () => new Date('2026-02-01T00:00:00.000Z');

function namedEntries(count: number): string[] {
    return Array.from({ length: count }, (_, i) => entryMarkup({
        name: `Journal ${i + 1}`,
        profileHref: `https://portal.example/journals/profile/${100 + i}`,
    }));
}

describe('PageTransformer', () => {
    it('keeps document order and numbers entries 1..N', () => {
        const transformer = new PageTransformer(logger, { now: fixedNow });

        const report = transformer.transform(createRawPageCapture(4, listingPageMarkup(namedEntries(5))));

        expect(report.candidateCount).toBe(5);
        expect(report.pageErrors).toEqual([]);
        expect(report.records.map(r => [r.journal_name, r.journal_id, r.extraction_index, r.source_page_sequence])).toEqual([
            ['Journal 1', '100', 1, 4],
            ['Journal 2', '101', 2, 4],
            ['Journal 3', '102', 3, 4],
            ['Journal 4', '103', 4, 4],
            ['Journal 5', '104', 5, 4],
        ]);
    });

    it('returns nothing and no errors for a page without entries', () => {
        const transformer = new PageTransformer(logger);

        const report = transformer.transform(createRawPageCapture(1, listingPageMarkup([])));

        expect(report).toEqual({ pageSequence: 1, candidateCount: 0, records: [], pageErrors: [] });
    });

    it('isolates a failing entry from its neighbours', () => {
        const failAtThree: RecordExtractorFn = (entry, context) => {
            if (context.extractionIndex === 3) {
                throw new Error('unexpected markup');
            }
            return extractJournalRecord(entry, context);
        };
        const markup = listingPageMarkup(namedEntries(5));
        const clean = new PageTransformer(logger, { now: fixedNow }).transform(createRawPageCapture(2, markup));

        const report = new PageTransformer(logger, { extract: failAtThree, now: fixedNow }).transform(createRawPageCapture(2, markup));

        expect(report.pageErrors).toEqual([
            { kind: 'fragment_extraction', pageSequence: 2, fragmentIndex: 3, message: 'unexpected markup' },
        ]);
        expect(report.records).toEqual(clean.records.filter(record => record.extraction_index !== 3));
    });

    it('records a failed outcome as a page error', () => {
        const extract: RecordExtractorFn = () => ({ ok: false, reason: { kind: 'schema_violation', message: 'p_issn: Invalid' } });

        const report = new PageTransformer(logger, { extract }).transform(createRawPageCapture(7, listingPageMarkup(namedEntries(1))));

        expect(report.records).toEqual([]);
        expect(report.pageErrors).toEqual([
            { kind: 'fragment_extraction', pageSequence: 7, fragmentIndex: 1, message: 'p_issn: Invalid' },
        ]);
    });

    it('reports an unparsable capture as a single page error', () => {
        const report = new PageTransformer(logger).transform(createRawPageCapture(9, ''));

        expect(report).toEqual({
            pageSequence: 9,
            candidateCount: 0,
            records: [],
            pageErrors: [{ kind: 'page_parse', pageSequence: 9, message: 'Markup is empty' }],
        });
    });
});
