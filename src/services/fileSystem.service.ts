// src/services/fileSystem.service.ts
import fs from 'fs';
import path from 'path';
import { Logger } from 'pino';
import { getErrorMessageAndStack } from '../utils/errorUtils';
import { LocalFileStore, SinkResult } from '../types/sink.types';

/**
 * Local filesystem access for artifacts, archived captures and diagnostics.
 * Write failures come back as results, never as rejections.
 */
export class FileSystemService implements LocalFileStore {
    private readonly serviceBaseLogger: Logger;

    constructor(parentLogger: Logger) {
        this.serviceBaseLogger = parentLogger.child({ service: 'FileSystemService' });
    }

    private getMethodLogger(parentLogger: Logger | undefined, methodName: string): Logger {
        const base = parentLogger || this.serviceBaseLogger;
        return base.child({ serviceMethod: `FileSystemService.${methodName}` });
    }

    public async ensureDirExists(dirPath: string, parentLogger?: Logger): Promise<void> {
        const logger = this.getMethodLogger(parentLogger, 'ensureDirExists');
        if (!fs.existsSync(dirPath)) {
            logger.info({ path: dirPath, event: 'directory_create' }, 'Creating directory.');
            await fs.promises.mkdir(dirPath, { recursive: true });
        }
    }

    public async writeLocal(filePath: string, bytes: Buffer, parentLogger?: Logger): Promise<SinkResult> {
        const logger = this.getMethodLogger(parentLogger, 'writeLocal');
        const logContext = { filePath, byteLength: bytes.length };
        logger.trace({ ...logContext, event: 'write_local_start' });
        try {
            await this.ensureDirExists(path.dirname(filePath), logger);
            await fs.promises.writeFile(filePath, bytes);
            logger.debug({ ...logContext, event: 'write_local_success' }, `Wrote ${filePath}.`);
            return { ok: true, location: filePath };
        } catch (error) {
            const { message, stack } = getErrorMessageAndStack(error);
            logger.error({ ...logContext, err: { message, stack }, event: 'write_local_failed' }, `Could not write ${filePath}: ${message}`);
            return { ok: false, location: filePath, error: message };
        }
    }
}
