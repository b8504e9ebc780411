// src/services/logging.service.test.ts
import 'reflect-metadata';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { ConfigService } from '../config/config.service';
import { LoggingService } from './logging.service';

interface LogLine {
    level: string;
    msg: string;
    runId?: string;
    event?: string;
}

async function readLines(filePath: string): Promise<LogLine[]> {
    const content = await fs.promises.readFile(filePath, 'utf8');
    return content.trim().split('\n').map(line => JSON.parse(line));
}

describe('LoggingService', () => {
    const savedEnv = { ...process.env };
    let logsDir: string;

    beforeEach(async () => {
        logsDir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'harvester-logs-'));
        process.env.LOGS_DIRECTORY = logsDir;
        process.env.LOG_TO_CONSOLE = 'false';
        process.env.LOG_LEVEL = 'info';
    });

    afterEach(async () => {
        process.env = { ...savedEnv };
        await fs.promises.rm(logsDir, { recursive: true, force: true });
    });

    it('writes run entries to the run log and the application log', async () => {
        const logging = new LoggingService(new ConfigService());
        logging.initialize();

        logging.getRunLogger('run-42').info({ event: 'probe' }, 'hello run');
        await logging.flushLogsAndClose();

        const runLines = await readLines(path.join(logsDir, 'runs', 'run-42.log'));
        expect(runLines.map(line => line.msg)).toEqual(['Run logger initialized.', 'hello run', 'Closing run logger.']);
        expect(runLines.every(line => line.runId === 'run-42')).toBe(true);
        expect(runLines[1]).toMatchObject({ level: 'info', event: 'probe' });

        const appLines = await readLines(path.join(logsDir, 'app.log'));
        expect(appLines[0].msg).toBe('Loggers initialized.');
        expect(appLines.find(line => line.msg === 'hello run')?.runId).toBe('run-42');
    });

    it('hands out the same run logger until it is closed', async () => {
        const logging = new LoggingService(new ConfigService());
        logging.initialize();

        const first = logging.getRunLogger('run-7');
        expect(logging.getRunLogger('run-7')).toBe(first);
        await logging.closeRunLogger('run-7');
        expect(logging.getRunLogger('run-7')).not.toBe(first);

        await logging.flushLogsAndClose();
    });
});
