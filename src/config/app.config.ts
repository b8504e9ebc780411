// src/config/app.config.ts
import path from 'path';
import { LevelWithSilent } from 'pino';
import { AppConfig, OutputFormat } from './types';

export class AppConfiguration {
    public readonly nodeEnv: 'development' | 'production' | 'test';

    public readonly logLevel: LevelWithSilent;
    public readonly logsDirectoryPath: string;
    public readonly appLogFileName: string;
    public readonly logToConsole: boolean;
    public readonly runLogSubdir: string = 'runs';
    public readonly diagnosticsSubdir: string = 'diagnostics';

    public readonly inputSource: 'crawl' | 'archive';
    public readonly inputDirectoryPath: string;
    public readonly archiveCaptures: boolean;
    public readonly outputDirectoryPath: string;
    public readonly outputFormat: OutputFormat;

    constructor(appConfig: AppConfig) {
        this.nodeEnv = appConfig.NODE_ENV;

        this.logLevel = appConfig.LOG_LEVEL;
        this.logsDirectoryPath = path.resolve(appConfig.LOGS_DIRECTORY);
        this.appLogFileName = appConfig.APP_LOG_FILE_NAME;
        this.logToConsole = appConfig.LOG_TO_CONSOLE;

        this.inputSource = appConfig.INPUT_SOURCE;
        this.inputDirectoryPath = path.resolve(appConfig.INPUT_DIRECTORY);
        this.archiveCaptures = appConfig.ARCHIVE_CAPTURES;
        this.outputDirectoryPath = path.resolve(appConfig.OUTPUT_DIRECTORY);
        this.outputFormat = appConfig.OUTPUT_FORMAT;
    }

    get appLogFilePath(): string {
        return path.join(this.logsDirectoryPath, this.appLogFileName);
    }

    get runLogDirectory(): string {
        return path.join(this.logsDirectoryPath, this.runLogSubdir);
    }

    get diagnosticsDirectory(): string {
        return path.join(this.logsDirectoryPath, this.diagnosticsSubdir);
    }

    public getRunLogFilePath(runId: string): string {
        return path.join(this.runLogDirectory, `${runId}.log`);
    }
}
