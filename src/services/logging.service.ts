// src/services/logging.service.ts
import 'reflect-metadata';
import { singleton, inject } from 'tsyringe';
import pino, { Bindings, Level, Logger, LoggerOptions, StreamEntry, stdTimeFunctions } from 'pino';
import pretty from 'pino-pretty';
import fs from 'fs';
import { ConfigService } from '../config/config.service';
import { getErrorMessageAndStack } from '../utils/errorUtils';

type FileDestination = ReturnType<typeof pino.destination>;

interface RunLoggerEntry {
    logger: Logger;
    stream: FileDestination;
    filePath: string;
}

const STREAM_CLOSE_TIMEOUT_MS = 3000;

function closeDestination(stream: FileDestination): Promise<void> {
    return new Promise(resolve => {
        const timer = setTimeout(resolve, STREAM_CLOSE_TIMEOUT_MS);
        stream.once('close', () => {
            clearTimeout(timer);
            resolve();
        });
        stream.end();
    });
}

/**
 * Owns every pino logger of the process: the application logger (console plus
 * `app.log`) and one file logger per run under `logs/runs/`. Run loggers also
 * write to the console and to `app.log`.
 */
@singleton()
export class LoggingService {
    private appLoggerInternal: Logger | null = null;
    private appFileStream: FileDestination | null = null;
    private consoleStream: StreamEntry['stream'] | null = null;
    private readonly runLoggers = new Map<string, RunLoggerEntry>();
    private isShuttingDown = false;

    constructor(@inject(ConfigService) private readonly configService: ConfigService) { }

    private get streamLevel(): Level {
        const level = this.configService.logLevel;
        return level === 'silent' ? 'fatal' : level;
    }

    private baseOptions(base: Bindings | undefined): LoggerOptions {
        return {
            level: this.configService.logLevel,
            timestamp: stdTimeFunctions.isoTime,
            formatters: { level: (label) => ({ level: label }) },
            base,
        };
    }

    private sharedStreams(): StreamEntry[] {
        const streams: StreamEntry[] = [];
        if (this.consoleStream) {
            streams.push({ level: this.streamLevel, stream: this.consoleStream });
        }
        if (this.appFileStream) {
            streams.push({ level: this.streamLevel, stream: this.appFileStream });
        }
        return streams;
    }

    public initialize(): void {
        if (this.appLoggerInternal) {
            return;
        }
        fs.mkdirSync(this.configService.logsDirectory, { recursive: true });

        if (this.configService.logToConsole) {
            this.consoleStream = this.configService.isProduction
                ? process.stdout
                : pretty({ colorize: true, levelFirst: true, translateTime: 'SYS:standard', ignore: 'pid,hostname' });
        }
        this.appFileStream = pino.destination({ dest: this.configService.appLogFilePath, mkdir: true, sync: false });

        this.appLoggerInternal = pino(this.baseOptions(undefined), pino.multistream(this.sharedStreams()));
        this.appLoggerInternal.info({ service: 'LoggingService', event: 'logging_initialized', appLogFilePath: this.configService.appLogFilePath }, 'Loggers initialized.');
    }

    public get appLogger(): Logger {
        if (!this.appLoggerInternal || this.isShuttingDown) {
            return pino({ level: this.configService.logLevel, name: 'FallbackAppLogger' });
        }
        return this.appLoggerInternal;
    }

    public getLogger(context?: Bindings): Logger {
        return context ? this.appLogger.child(context) : this.appLogger;
    }

    /**
     * File logger of one run, writing to `logs/runs/<runId>.log`. Every entry
     * carries the run id.
     */
    public getRunLogger(runId: string): Logger {
        const existing = this.runLoggers.get(runId);
        if (existing) {
            return existing.logger;
        }
        const filePath = this.configService.getRunLogFilePath(runId);
        let stream: FileDestination;
        try {
            stream = pino.destination({ dest: filePath, mkdir: true, sync: false });
        } catch (error) {
            const { message } = getErrorMessageAndStack(error);
            this.appLogger.error({ service: 'LoggingService', event: 'run_logger_file_failed', runId, filePath, err: { message } }, 'Run log file unavailable; logging to the application log only.');
            return this.appLogger.child({ runId });
        }

        const logger = pino(this.baseOptions({ runId }), pino.multistream([
            ...this.sharedStreams(),
            { level: this.streamLevel, stream },
        ]));
        this.runLoggers.set(runId, { logger, stream, filePath });
        logger.info({ service: 'LoggingService', event: 'run_logger_created', logFilePath: filePath }, 'Run logger initialized.');
        return logger;
    }

    public async closeRunLogger(runId: string): Promise<void> {
        const entry = this.runLoggers.get(runId);
        if (!entry) {
            return;
        }
        this.runLoggers.delete(runId);
        entry.logger.info({ service: 'LoggingService', event: 'run_logger_closing', logFilePath: entry.filePath }, 'Closing run logger.');
        await closeDestination(entry.stream);
    }

    public async flushLogsAndClose(): Promise<void> {
        if (this.isShuttingDown) {
            return;
        }
        this.appLoggerInternal?.info({ service: 'LoggingService', event: 'log_stream_close_start_all' }, 'Closing all log streams.');
        this.isShuttingDown = true;

        const runIds = Array.from(this.runLoggers.keys());
        await Promise.all(runIds.map(runId => this.closeRunLogger(runId)));
        if (this.appFileStream) {
            await closeDestination(this.appFileStream);
            this.appFileStream = null;
        }
        this.appLoggerInternal = null;
    }
}
