// src/services/htmlPersistence.service.ts
import path from 'path';
import { Logger } from 'pino';
import { RawPageCapture } from '../types/journal.types';
import { CaptureArchive, CrawlDiagnostics, CrawlDiagnosticsSink } from '../types/crawl.types';
import { LocalFileStore } from '../types/sink.types';
import { fileTimestamp } from '../journal/journalSerializer';

export interface HtmlPersistenceOptions {
    /** Where live captures are archived; null turns archiving off. */
    archiveDirectory: string | null;
    diagnosticsDirectory: string;
    now?: () => Date;
}

export function captureFileName(capture: RawPageCapture): string {
    return `journals_page${capture.sequenceNumber}_${fileTimestamp(capture.capturedAt)}.html`;
}

/**
 * Saves rendered pages: every capture of a live crawl into the archive
 * directory, and the markup and screenshot of an aborted crawl into the
 * diagnostics directory.
 */
export class HtmlPersistenceService implements CaptureArchive, CrawlDiagnosticsSink {
    private readonly serviceBaseLogger: Logger;
    private readonly now: () => Date;

    constructor(
        private readonly fileStore: LocalFileStore,
        private readonly options: HtmlPersistenceOptions,
        parentLogger: Logger,
    ) {
        this.serviceBaseLogger = parentLogger.child({ service: 'HtmlPersistenceService' });
        this.now = options.now ?? (() => new Date());
    }

    public async archiveCapture(capture: RawPageCapture): Promise<string | null> {
        if (this.options.archiveDirectory === null) {
            return null;
        }
        const logger = this.serviceBaseLogger.child({ serviceMethod: 'HtmlPersistenceService.archiveCapture' });
        const filePath = path.join(this.options.archiveDirectory, captureFileName(capture));
        const result = await this.fileStore.writeLocal(filePath, Buffer.from(capture.markup, 'utf8'));
        if (!result.ok) {
            throw new Error(`Could not archive capture ${capture.sequenceNumber} to ${filePath}: ${result.error}`);
        }
        logger.info({ event: 'capture_archived', sequenceNumber: capture.sequenceNumber, filePath }, `Archived page ${capture.sequenceNumber}.`);
        return result.location;
    }

    public async saveDiagnostics(diagnostics: CrawlDiagnostics): Promise<string[]> {
        const logger = this.serviceBaseLogger.child({ serviceMethod: 'HtmlPersistenceService.saveDiagnostics' });
        const baseName = path.join(this.options.diagnosticsDirectory, `crawl_abort_${fileTimestamp(this.now())}`);
        const payloads: Array<[string, Buffer]> = [
            [`${baseName}.txt`, Buffer.from(`${diagnostics.reason}\n`, 'utf8')],
        ];
        if (diagnostics.markup !== undefined) {
            payloads.push([`${baseName}.html`, Buffer.from(diagnostics.markup, 'utf8')]);
        }
        if (diagnostics.screenshot !== undefined) {
            payloads.push([`${baseName}.png`, diagnostics.screenshot]);
        }

        const locations: string[] = [];
        for (const [filePath, bytes] of payloads) {
            const result = await this.fileStore.writeLocal(filePath, bytes);
            if (result.ok) {
                locations.push(result.location);
            } else {
                logger.warn({ event: 'diagnostics_file_failed', filePath, error: result.error }, `Could not save diagnostics file ${filePath}.`);
            }
        }
        return locations;
    }
}
