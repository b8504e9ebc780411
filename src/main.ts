#!/usr/bin/env node
// src/main.ts
import 'reflect-metadata';
import './container';
import { container } from 'tsyringe';
import { Command, InvalidArgumentError, Option } from 'commander';
import { Logger } from 'pino';
import { RunConfigurationOverrides } from './config/config.service';
import { OutputFormat } from './config/types';
import { JournalRunnerService } from './services/journalRunner.service';
import { LoggingService } from './services/logging.service';
import { PlaywrightService } from './services/playwright.service';
import { ConfigurationError, getErrorMessageAndStack } from './utils/errorUtils';

interface CommonCommandOptions {
    inputDir?: string;
    maxPages?: number;
}

interface RunCommandOptions extends CommonCommandOptions {
    source?: 'crawl' | 'archive';
    outputDir?: string;
    format?: OutputFormat;
    archive?: boolean;
    hdfs?: boolean;
    hdfsUrl?: string;
    hdfsPath?: string;
    hdfsUser?: string;
}

let loggingService: LoggingService | undefined;
let isShuttingDown = false;

function parsePositiveInt(value: string): number {
    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed < 1) {
        throw new InvalidArgumentError('Expected a positive integer.');
    }
    return parsed;
}

function toOverrides(options: RunCommandOptions): RunConfigurationOverrides {
    return {
        inputSource: options.source,
        inputDirectory: options.inputDir,
        archiveCaptures: options.archive,
        outputDirectory: options.outputDir,
        outputFormat: options.format,
        maxPages: options.maxPages,
        hdfsEnabled: options.hdfs,
        hdfsUrl: options.hdfsUrl,
        hdfsPath: options.hdfsPath,
        hdfsUser: options.hdfsUser,
    };
}

function startLogging(): LoggingService | null {
    try {
        const service = container.resolve(LoggingService);
        service.initialize();
        return service;
    } catch (error) {
        if (error instanceof ConfigurationError) {
            console.error(`Configuration error:\n  ${error.issues.join('\n  ') || error.message}`);
        } else {
            console.error('FATAL: could not start the harvester.', getErrorMessageAndStack(error).message);
        }
        return null;
    }
}

/**
 * Runs one command and always flushes the logs. Resolves to the process exit code.
 */
async function execute(command: string, work: (runner: JournalRunnerService, logger: Logger) => Promise<number>): Promise<number> {
    const logging = startLogging();
    if (!logging) {
        return 1;
    }
    loggingService = logging;

    const logger = logging.getLogger({ service: 'Cli', command });
    try {
        return await work(container.resolve(JournalRunnerService), logger);
    } catch (error) {
        const { message, stack } = getErrorMessageAndStack(error);
        logger.fatal({ event: 'command_failed', err: { message, stack } }, `Command ${command} failed: ${message}`);
        return 1;
    } finally {
        await logging.flushLogsAndClose();
    }
}

const program = new Command();

program
    .name('journal-harvester')
    .description('Harvests an accredited journal catalog into CSV, JSON and HDFS artifacts');

program
    .command('run')
    .description('Capture (or replay) the listing pages, extract the journal records and write them to every configured sink')
    .addOption(new Option('--source <kind>', 'where page captures come from').choices(['crawl', 'archive']))
    .option('--input-dir <path>', 'capture archive directory')
    .option('--output-dir <path>', 'local artifact directory')
    .addOption(new Option('--format <format>', 'local artifact format').choices(['csv', 'json', 'both']))
    .option('--max-pages <n>', 'page cap of a live crawl', parsePositiveInt)
    .option('--archive', 'save every live capture to the archive directory')
    .option('--no-archive', 'do not save live captures')
    .option('--hdfs', 'upload the artifacts to HDFS')
    .option('--no-hdfs', 'skip the HDFS upload')
    .option('--hdfs-url <url>', 'WebHDFS endpoint')
    .option('--hdfs-path <path>', 'HDFS root directory')
    .option('--hdfs-user <name>', 'HDFS user name')
    .action(async (options: RunCommandOptions) => {
        process.exitCode = await execute('run', async (runner, logger) => {
            const report = await runner.run(toOverrides(options));
            logger.info({
                event: 'run_summary',
                runId: report.runId,
                status: report.status,
                statistics: report.statistics,
                artifacts: report.artifacts,
                statisticsPath: report.statisticsPath,
            }, `Run ${report.status}: ${report.statistics.successful_extractions} record(s), ${report.artifacts.length} artifact(s).`);
            return report.status === 'aborted' ? 1 : 0;
        });
    });

program
    .command('capture')
    .description('Crawl the listing and save every rendered page to the archive directory')
    .option('--input-dir <path>', 'capture archive directory')
    .option('--max-pages <n>', 'page cap of the crawl', parsePositiveInt)
    .action(async (options: CommonCommandOptions) => {
        process.exitCode = await execute('capture', async (runner, logger) => {
            const report = await runner.capture({ inputDirectory: options.inputDir, maxPages: options.maxPages });
            const { outcome, pagesArchived, archiveDirectory } = report;
            logger.info({ event: 'capture_summary', runId: report.runId, outcome, pagesArchived, archiveDirectory }, `Capture ${outcome.status}: ${pagesArchived} of ${outcome.pagesCaptured} page(s) saved in ${archiveDirectory}.`);
            return outcome.status === 'aborted' || pagesArchived < outcome.pagesCaptured ? 1 : 0;
        });
    });

async function shutdown(signal: NodeJS.Signals): Promise<void> {
    if (isShuttingDown) {
        return;
    }
    isShuttingDown = true;
    console.warn(`Received ${signal}; closing the browser and flushing logs.`);
    try {
        await container.resolve(PlaywrightService).close();
        await loggingService?.flushLogsAndClose();
    } finally {
        process.exit(130);
    }
}

const shutdownSignals: NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];
shutdownSignals.forEach(signal => {
    process.on(signal, () => {
        shutdown(signal).catch(error => {
            console.error('Shutdown failed:', getErrorMessageAndStack(error).message);
            process.exit(1);
        });
    });
});

program.parseAsync(process.argv).catch(error => {
    console.error(getErrorMessageAndStack(error).message);
    process.exit(1);
});
