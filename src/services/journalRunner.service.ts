// src/services/journalRunner.service.ts
import 'reflect-metadata';
import { singleton, inject } from 'tsyringe';
import { v4 as uuidv4 } from 'uuid';
import { Logger } from 'pino';
import { Page } from 'playwright-core';
import { ConfigService, RunConfigurationOverrides } from '../config/config.service';
import { CrawlSettings } from '../config/types';
import { CaptureOutcome, CaptureSource } from '../types/crawl.types';
import { RawPageCapture } from '../types/journal.types';
import { getErrorMessageAndStack } from '../utils/errorUtils';
import { ArchiveCaptureSource } from '../journal/archiveCaptureSource';
import { JournalCrawlStateMachine } from '../journal/crawlStateMachine';
import { PageTransformer } from '../journal/pageTransformer';
import { FileSystemService } from './fileSystem.service';
import { HtmlPersistenceService } from './htmlPersistence.service';
import { JournalPipeline, RunReport } from './journalPipeline.service';
import { LoggingService } from './logging.service';
import { PlaywrightService } from './playwright.service';
import { PlaywrightPageRenderer } from './playwrightPageRenderer';
import { createSinkWriters } from './sinkWriter.service';
import { WebHdfsService } from './webHdfs.service';

export interface CaptureReport {
    runId: string;
    archiveDirectory: string;
    outcome: CaptureOutcome;
    pagesArchived: number;
}

interface OpenedSource {
    source: CaptureSource;
    pagesArchived(): number;
    release(): Promise<void>;
}

/**
 * Stands in for a crawl whose browser could not be started: yields nothing
 * and ends aborted, so the run still reports and writes its statistics.
 */
export class UnavailableCrawlSource implements CaptureSource {
    public readonly description: string;

    constructor(portalUrl: string, private readonly message: string) {
        this.description = `live crawl of ${portalUrl} (browser unavailable)`;
    }

    public async *captures(): AsyncGenerator<RawPageCapture, CaptureOutcome, void> {
        return {
            status: 'aborted',
            reason: 'navigation_failure',
            pagesCaptured: 0,
            step: 'launch_browser',
            message: this.message,
            diagnostics: [],
            errors: [`Crawl aborted during launch_browser after 0 page(s): ${this.message}`],
        };
    }
}

/**
 * Composition root of a run: builds the stores, the capture source, the
 * transformer and the sinks from the run configuration, and owns the run
 * logger and the browser for the duration of the run.
 */
@singleton()
export class JournalRunnerService {
    constructor(
        @inject(ConfigService) private readonly configService: ConfigService,
        @inject(LoggingService) private readonly loggingService: LoggingService,
        @inject(PlaywrightService) private readonly playwrightService: PlaywrightService,
    ) { }

    public async run(overrides: RunConfigurationOverrides = {}): Promise<RunReport> {
        const runId = uuidv4();
        const config = this.configService.getRunConfiguration(overrides);
        const logger = this.loggingService.getRunLogger(runId);
        logger.info({ event: 'run_configuration', input: config.input, outputDirectory: config.outputDirectory, outputFormat: config.outputFormat, remoteEnabled: config.remote.enabled }, 'Run configuration resolved.');

        try {
            const localStore = new FileSystemService(logger);
            const opened: OpenedSource = config.input.kind === 'archive'
                ? { source: new ArchiveCaptureSource(config.input.directory, logger), pagesArchived: () => 0, release: async () => undefined }
                : await this.openCrawl(config.crawl, config.input.archiveDirectory, localStore, logger);

            try {
                const remoteStore = config.remote.enabled
                    ? new WebHdfsService({ endpoint: config.remote.endpoint, user: config.remote.user, timeoutMs: config.remote.timeoutMs }, logger)
                    : null;
                const pipeline = new JournalPipeline(config, {
                    runId,
                    source: opened.source,
                    transformer: new PageTransformer(logger),
                    sinks: createSinkWriters(config, { localStore, remoteStore }, logger),
                    localStore,
                    logger,
                });
                return await pipeline.run();
            } finally {
                await opened.release();
            }
        } finally {
            await this.loggingService.closeRunLogger(runId);
        }
    }

    /**
     * Live crawl only: every capture goes to the archive directory, nothing is
     * transformed or written to a sink.
     */
    public async capture(overrides: RunConfigurationOverrides = {}): Promise<CaptureReport> {
        const runId = uuidv4();
        const config = this.configService.getRunConfiguration({ ...overrides, inputSource: 'crawl', archiveCaptures: true });
        const archiveDirectory = config.input.kind === 'crawl' ? config.input.archiveDirectory : null;
        if (archiveDirectory === null) {
            throw new Error('Capture mode needs an archive directory');
        }
        const logger = this.loggingService.getRunLogger(runId);

        try {
            const opened = await this.openCrawl(config.crawl, archiveDirectory, new FileSystemService(logger), logger);
            try {
                const generator = opened.source.captures();
                let step = await generator.next();
                while (!step.done) {
                    step = await generator.next();
                }
                const outcome = step.value;
                const pagesArchived = opened.pagesArchived();
                const level = outcome.status === 'aborted' || pagesArchived < outcome.pagesCaptured ? 'warn' : 'info';
                logger[level]({ event: 'capture_finished', status: outcome.status, pagesCaptured: outcome.pagesCaptured, pagesArchived, errors: outcome.errors, archiveDirectory }, `Capture finished: ${pagesArchived} of ${outcome.pagesCaptured} page(s) archived.`);
                return { runId, archiveDirectory, outcome, pagesArchived };
            } finally {
                await opened.release();
            }
        } finally {
            await this.loggingService.closeRunLogger(runId);
        }
    }

    /**
     * A browser that fails to start, or to open a page, is closed again and
     * the crawl is replaced by an `UnavailableCrawlSource`.
     */
    private async openCrawl(settings: CrawlSettings, archiveDirectory: string | null, localStore: FileSystemService, logger: Logger): Promise<OpenedSource> {
        let page: Page;
        try {
            await this.playwrightService.initialize(logger);
            page = await this.playwrightService.newPage(logger);
        } catch (error) {
            const { message, stack } = getErrorMessageAndStack(error);
            logger.error({ event: 'crawl_open_failed', err: { message, stack } }, `Could not open a browser page for the crawl: ${message}`);
            await this.playwrightService.close(logger);
            return { source: new UnavailableCrawlSource(settings.portalUrl, message), pagesArchived: () => 0, release: async () => undefined };
        }
        const persistence = new HtmlPersistenceService(localStore, {
            archiveDirectory,
            diagnosticsDirectory: this.configService.diagnosticsDirectory,
        }, logger);

        const machine = new JournalCrawlStateMachine(new PlaywrightPageRenderer(page, settings.waitTimeoutMs, logger), {
            settings,
            logger,
            diagnostics: persistence,
            archive: persistence,
        });
        return {
            source: machine,
            pagesArchived: () => machine.pagesArchived,
            release: () => this.playwrightService.close(logger),
        };
    }
}
