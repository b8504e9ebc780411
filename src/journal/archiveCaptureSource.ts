// src/journal/archiveCaptureSource.ts
import fs from 'fs';
import path from 'path';
import { Logger } from 'pino';
import { getErrorMessageAndStack } from '../utils/errorUtils';
import { createRawPageCapture, RawPageCapture } from '../types/journal.types';
import { CaptureOutcome, CaptureSource } from '../types/crawl.types';

const CAPTURE_FILE_PATTERN = /\.html?$/i;

export function sortCaptureFileNames(names: readonly string[]): string[] {
    return names
        .filter(name => CAPTURE_FILE_PATTERN.test(name))
        .sort((a, b) => a.localeCompare(b, undefined, { numeric: true, sensitivity: 'base' }));
}

/**
 * Replays page captures saved by an earlier crawl. Files are taken in natural
 * name order; a file's position in that order is its sequence number, so an
 * unreadable file leaves a gap instead of renumbering the rest.
 */
export class ArchiveCaptureSource implements CaptureSource {
    public readonly description: string;
    private readonly logger: Logger;

    constructor(private readonly directory: string, parentLogger: Logger) {
        this.description = `capture archive ${directory}`;
        this.logger = parentLogger.child({ service: 'ArchiveCaptureSource', directory });
    }

    public async *captures(): AsyncGenerator<RawPageCapture, CaptureOutcome, void> {
        const errors: string[] = [];
        let names: string[];
        try {
            names = sortCaptureFileNames(await fs.promises.readdir(this.directory));
        } catch (error) {
            const { message } = getErrorMessageAndStack(error);
            this.logger.error({ event: 'archive_list_failed', err: { message } }, `Cannot list capture archive: ${message}`);
            errors.push(`Cannot read capture archive ${this.directory}: ${message}`);
            return { status: 'done', reason: 'archive_exhausted', pagesCaptured: 0, errors };
        }

        this.logger.info({ event: 'archive_listed', fileCount: names.length }, `Found ${names.length} capture file(s).`);
        let pagesCaptured = 0;

        for (const [position, name] of names.entries()) {
            const filePath = path.join(this.directory, name);
            let capture: RawPageCapture;
            try {
                const [markup, stats] = await Promise.all([
                    fs.promises.readFile(filePath, 'utf8'),
                    fs.promises.stat(filePath),
                ]);
                capture = createRawPageCapture(position + 1, markup, stats.mtime);
            } catch (error) {
                const { message } = getErrorMessageAndStack(error);
                this.logger.warn({ event: 'archive_read_failed', filePath, err: { message } }, `Skipping unreadable capture ${name}.`);
                errors.push(`Cannot read capture ${name}: ${message}`);
                continue;
            }
            pagesCaptured += 1;
            this.logger.debug({ event: 'archive_capture_loaded', filePath, sequenceNumber: capture.sequenceNumber }, `Loaded ${name}.`);
            yield capture;
        }

        return { status: 'done', reason: 'archive_exhausted', pagesCaptured, errors };
    }
}
