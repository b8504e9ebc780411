// src/config/config.service.ts
import 'reflect-metadata';
import { singleton } from 'tsyringe';
import dotenv from 'dotenv';
import path from 'path';
import { z } from 'zod';

import { envSchema } from './schemas';
import { AppConfig, BrowserSettings, CrawlSettings, OutputFormat, RemoteSinkConfig, RunConfiguration } from './types';
import { AppConfiguration } from './app.config';
import { CrawlConfiguration } from './crawl.config';
import { HdfsConfig } from './hdfs.config';
import { ConfigurationError } from '../utils/errorUtils';

/**
 * Per-invocation overrides, usually coming from CLI flags. Unset fields keep
 * the environment value.
 */
export interface RunConfigurationOverrides {
    inputSource?: 'crawl' | 'archive';
    inputDirectory?: string;
    archiveCaptures?: boolean;
    outputDirectory?: string;
    outputFormat?: OutputFormat;
    maxPages?: number;
    hdfsEnabled?: boolean;
    hdfsUrl?: string;
    hdfsPath?: string;
    hdfsUser?: string;
}

/**
 * Validates an environment record against `envSchema`.
 * @throws {ConfigurationError} listing every failing variable.
 */
export function loadAppConfig(env: NodeJS.ProcessEnv): AppConfig {
    try {
        return envSchema.parse(env);
    } catch (error) {
        if (error instanceof z.ZodError) {
            const issues = error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
            throw new ConfigurationError(`Invalid environment variables: ${issues.join('; ')}`, issues);
        }
        throw error;
    }
}

/**
 * Combines the validated environment with per-invocation overrides into the
 * immutable configuration of one run.
 */
export function buildRunConfiguration(appConfig: AppConfig, overrides: RunConfigurationOverrides = {}): RunConfiguration {
    const app = new AppConfiguration(appConfig);
    const crawl: CrawlSettings = new CrawlConfiguration(appConfig).settings;
    const hdfs = new HdfsConfig(appConfig);

    if (overrides.maxPages !== undefined) {
        if (!Number.isInteger(overrides.maxPages) || overrides.maxPages < 1) {
            throw new ConfigurationError(`Page cap must be a positive integer, got ${overrides.maxPages}`);
        }
        crawl.maxPages = overrides.maxPages;
    }

    const inputDirectory = overrides.inputDirectory !== undefined
        ? path.resolve(overrides.inputDirectory)
        : app.inputDirectoryPath;
    const inputSource = overrides.inputSource ?? app.inputSource;
    const archiveCaptures = overrides.archiveCaptures ?? app.archiveCaptures;

    const remoteEnabled = overrides.hdfsEnabled ?? hdfs.enabled;
    const remote: RemoteSinkConfig = remoteEnabled
        ? {
            enabled: true,
            endpoint: (overrides.hdfsUrl ?? hdfs.endpoint).replace(/\/+$/, ''),
            rootPath: (overrides.hdfsPath ?? hdfs.rootPath).replace(/\/+$/, '') || '/',
            user: overrides.hdfsUser ?? hdfs.user,
            timeoutMs: hdfs.timeoutMs,
        }
        : { enabled: false };

    const runConfiguration: RunConfiguration = {
        input: inputSource === 'archive'
            ? { kind: 'archive', directory: inputDirectory }
            : { kind: 'crawl', portalUrl: crawl.portalUrl, archiveDirectory: archiveCaptures ? inputDirectory : null },
        outputDirectory: overrides.outputDirectory !== undefined
            ? path.resolve(overrides.outputDirectory)
            : app.outputDirectoryPath,
        outputFormat: overrides.outputFormat ?? app.outputFormat,
        remote,
        crawl,
        logsDirectory: app.logsDirectoryPath,
    };
    return Object.freeze(runConfiguration);
}

@singleton()
export class ConfigService {
    public readonly rawConfig: AppConfig;
    public readonly appConfiguration: AppConfiguration;
    public readonly browserSettings: Readonly<BrowserSettings>;

    constructor() {
        dotenv.config();

        this.rawConfig = loadAppConfig(process.env);
        this.appConfiguration = new AppConfiguration(this.rawConfig);
        this.browserSettings = Object.freeze({
            channel: this.rawConfig.PLAYWRIGHT_CHANNEL,
            headless: this.rawConfig.PLAYWRIGHT_HEADLESS,
            userAgent: this.rawConfig.USER_AGENT,
        });
    }

    // --- Delegated Getters ---
    get isProduction(): boolean { return this.appConfiguration.nodeEnv === 'production'; }
    get logLevel() { return this.appConfiguration.logLevel; }
    get logToConsole() { return this.appConfiguration.logToConsole; }
    get logsDirectory(): string { return this.appConfiguration.logsDirectoryPath; }
    get appLogFilePath(): string { return this.appConfiguration.appLogFilePath; }
    get diagnosticsDirectory(): string { return this.appConfiguration.diagnosticsDirectory; }

    public getRunLogFilePath(runId: string): string {
        return this.appConfiguration.getRunLogFilePath(runId);
    }

    public getRunConfiguration(overrides: RunConfigurationOverrides = {}): RunConfiguration {
        return buildRunConfiguration(this.rawConfig, overrides);
    }
}
