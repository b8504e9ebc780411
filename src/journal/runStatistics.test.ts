// src/journal/runStatistics.test.ts
import { RunStatistics } from './runStatistics';
import { makeRecord } from './__fixtures__/records';

describe('RunStatistics', () => {
    it('accumulates pages, extractions and sink outcomes', () => {
        const statistics = new RunStatistics();
        statistics.registerSink('local_csv');
        statistics.registerSink('hdfs');

        statistics.recordPage({
            pageSequence: 1,
            candidateCount: 3,
            records: [makeRecord(), makeRecord({ extraction_index: 3 })],
            pageErrors: [{ kind: 'fragment_extraction', pageSequence: 1, fragmentIndex: 2, message: 'broken' }],
        });
        statistics.recordPage({
            pageSequence: 2,
            candidateCount: 0,
            records: [],
            pageErrors: [{ kind: 'page_parse', pageSequence: 2, message: 'Markup is empty' }],
        });
        statistics.recordSinkOutcome({ sink: 'local_csv', ok: true, locations: ['/out/a.csv'], errors: [] });
        statistics.recordSinkOutcome({ sink: 'hdfs', ok: false, locations: ['/user/j/a.csv'], errors: ['connection refused'] });

        expect(statistics.finalize()).toEqual({
            total_pages: 2,
            total_candidates: 3,
            successful_extractions: 2,
            failed_extractions: 1,
            sink_successes: { local_csv: 1, hdfs: 1 },
            sink_failures: { local_csv: 0, hdfs: 1 },
            errors: [
                'Fragment #2 on page 1 failed: broken',
                'Page 2 could not be parsed: Markup is empty',
                'Sink hdfs failed: connection refused',
            ],
        });
    });

    it('is read-only once finalized', () => {
        const statistics = new RunStatistics();
        statistics.recordError('first');

        const snapshot = statistics.finalize();

        expect(statistics.isFinalized).toBe(true);
        expect(statistics.finalize()).toBe(snapshot);
        expect(Object.isFrozen(snapshot)).toBe(true);
        expect(Object.isFrozen(snapshot.errors)).toBe(true);
        expect(() => statistics.recordError('second')).toThrow('Run statistics have been finalized');
        expect(snapshot.errors).toEqual(['first']);
    });
});
