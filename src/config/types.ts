// src/config/types.ts
import { z } from 'zod';
import { type envSchema } from './schemas';

/**
 * Type inferred from the Zod schema for environment variables.
 * This represents the raw parsed configuration.
 */
export type AppConfig = z.infer<typeof envSchema>;

export type OutputFormat = AppConfig['OUTPUT_FORMAT'];

/** How the crawl browser is launched. */
export interface BrowserSettings {
    /** Installed browser channel driven by playwright-core, e.g. `chrome` or `msedge`. */
    channel: string;
    headless: boolean;
    userAgent: string;
}

/**
 * CSS selectors for the portal controls the crawl interacts with.
 * Passed to the renderer untouched.
 */
export interface CrawlSelectors {
    filterToggle: string;
    filterPanel: string;
    accreditationCheckbox: string;
    filterSubmit: string;
    results: string;
    nextPage: string;
}

export interface CrawlSettings {
    portalUrl: string;
    selectors: CrawlSelectors;
    /** Hard cap on the number of captured pages. */
    maxPages: number;
    waitTimeoutMs: number;
    shortWaitTimeoutMs: number;
    /** Substituted for a results wait that timed out. */
    graceDelayMs: number;
    /** Pause after clicking "next" before waiting for the results marker. */
    settleDelayMs: number;
}

export type InputSourceConfig =
    | { kind: 'crawl'; portalUrl: string; archiveDirectory: string | null }
    | { kind: 'archive'; directory: string };

export type RemoteSinkConfig =
    | { enabled: false }
    | { enabled: true; endpoint: string; rootPath: string; user?: string; timeoutMs: number };

/**
 * Immutable configuration of a single harvesting run, handed to the pipeline
 * at construction.
 */
export interface RunConfiguration {
    readonly input: InputSourceConfig;
    readonly outputDirectory: string;
    readonly outputFormat: OutputFormat;
    readonly remote: RemoteSinkConfig;
    readonly crawl: CrawlSettings;
    readonly logsDirectory: string;
}
