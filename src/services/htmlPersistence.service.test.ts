// src/services/htmlPersistence.service.test.ts
import path from 'path';
import pino from 'pino';
import { createRawPageCapture } from '../types/journal.types';
import { captureFileName, HtmlPersistenceService } from './htmlPersistence.service';
import { MemoryFileStore } from './__fixtures__/memoryStores';

const logger = pino({ level: 'silent' });
const now = () => new Date(2026, 2, 1, 12, 30, 0);

describe('HtmlPersistenceService', () => {
    it('archives a capture under its sequence number and capture time', async () => {
        const store = new MemoryFileStore();
        const service = new HtmlPersistenceService(store, { archiveDirectory: '/archive', diagnosticsDirectory: '/logs/diagnostics', now }, logger);
        const capture = createRawPageCapture(3, '<html></html>', new Date(2026, 2, 1, 12, 0, 5));

        const location = await service.archiveCapture(capture);

        expect(captureFileName(capture)).toBe('journals_page3_20260301_120005.html');
        expect(location).toBe(path.join('/archive', 'journals_page3_20260301_120005.html'));
        expect(store.text(path.join('/archive', 'journals_page3_20260301_120005.html'))).toBe('<html></html>');
    });

    it('does nothing when archiving is off', async () => {
        const store = new MemoryFileStore();
        const service = new HtmlPersistenceService(store, { archiveDirectory: null, diagnosticsDirectory: '/logs/diagnostics' }, logger);

        expect(await service.archiveCapture(createRawPageCapture(1, '<p></p>'))).toBeNull();
        expect(store.files.size).toBe(0);
    });

    it('rejects when the archive write fails', async () => {
        const service = new HtmlPersistenceService(new MemoryFileStore(() => true), { archiveDirectory: '/archive', diagnosticsDirectory: '/d' }, logger);

        await expect(service.archiveCapture(createRawPageCapture(1, '<p></p>', new Date(2026, 2, 1, 0, 0, 0))))
            .rejects.toThrow('Could not archive capture 1');
    });

    it('saves what diagnostics it can', async () => {
        const store = new MemoryFileStore(filePath => filePath.endsWith('.png'));
        const service = new HtmlPersistenceService(store, { archiveDirectory: null, diagnosticsDirectory: '/logs/diagnostics', now }, logger);

        const locations = await service.saveDiagnostics({ reason: 'advance: click failed', markup: '<p>page 2</p>', screenshot: Buffer.from('png') });

        const base = path.join('/logs/diagnostics', 'crawl_abort_20260301_123000');
        expect(locations).toEqual([`${base}.txt`, `${base}.html`]);
        expect(store.text(`${base}.txt`)).toBe('advance: click failed\n');
    });
});
