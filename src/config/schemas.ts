// src/config/schemas.ts
import { z } from 'zod';

// --- Helper Functions for Environment Variable Parsing ---

/**
 * Parses a boolean-like environment value ("true", "1", "yes", "on" are truthy).
 * Any other non-empty value is false; an unset value falls back to `defaultValue`.
 */
export const parseBooleanFlag = (defaultValue: boolean) => (val: string | undefined): boolean => {
    if (val === undefined || val.trim() === '') {
        return defaultValue;
    }
    return ['true', '1', 'yes', 'on'].includes(val.trim().toLowerCase());
};

// --- Zod Schema Definition for Environment Variables ---
/**
 * Zod schema defining the structure and validation rules for environment variables.
 * Each property corresponds to an environment variable.
 */
export const envSchema = z.object({
    /**
     * The current Node.js environment.
     * @default 'development'
     */
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

    // --- Logging Configuration ---
    LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
    /**
     * Directory for the application log file and the per-run log files.
     * @default './logs'
     */
    LOGS_DIRECTORY: z.string().default('./logs'),
    APP_LOG_FILE_NAME: z.string().default('app.log'),
    LOG_TO_CONSOLE: z.string().optional().transform(parseBooleanFlag(true)),

    // --- Input / Output ---
    /**
     * Where page captures come from: a live crawl of the portal or a directory
     * of previously saved captures.
     * @default 'crawl'
     */
    INPUT_SOURCE: z.enum(['crawl', 'archive']).default('crawl'),
    /**
     * Capture archive directory. Read in archive mode, written by live crawls
     * when ARCHIVE_CAPTURES is on.
     */
    INPUT_DIRECTORY: z.string().default('./output_journals'),
    ARCHIVE_CAPTURES: z.string().optional().transform(parseBooleanFlag(true)),
    OUTPUT_DIRECTORY: z.string().default('./output_data'),
    OUTPUT_FORMAT: z.enum(['csv', 'json', 'both']).default('both'),

    // --- Crawl Configuration ---
    PORTAL_URL: z.string().url().default('https://sinta.kemdiktisaintek.go.id/journals/index/'),
    /**
     * Hard cap on the number of captured pages. Stops a looping pagination control.
     * @default 23
     */
    CRAWL_MAX_PAGES: z.coerce.number().int().positive().default(23),
    CRAWL_WAIT_TIMEOUT_MS: z.coerce.number().int().positive().default(70000),
    CRAWL_SHORT_WAIT_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),
    CRAWL_GRACE_DELAY_MS: z.coerce.number().int().nonnegative().default(10000),
    CRAWL_SETTLE_DELAY_MS: z.coerce.number().int().nonnegative().default(10000),
    CRAWL_SELECTOR_FILTER_TOGGLE: z.string().default("button[data-target='#filterJournal']"),
    CRAWL_SELECTOR_FILTER_PANEL: z.string().default('#filterJournal'),
    CRAWL_SELECTOR_ACCREDITATION_CHECKBOX: z.string().default('#filter_accreditation1'),
    CRAWL_SELECTOR_FILTER_SUBMIT: z.string().default("button[name='filter_journals'][value='1']"),
    CRAWL_SELECTOR_RESULTS: z.string().default('table.table'),
    CRAWL_SELECTOR_NEXT_PAGE: z.string().default('a.page-link:text-is("Next")'),

    // --- Playwright Configuration ---
    PLAYWRIGHT_CHANNEL: z.string().default('chrome'),
    PLAYWRIGHT_HEADLESS: z.string().optional().transform(parseBooleanFlag(true)),
    USER_AGENT: z.string().default('Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0 Safari/537.36'),

    // --- Distributed Filesystem (WebHDFS) ---
    HDFS_ENABLED: z.string().optional().transform(parseBooleanFlag(false)),
    HDFS_URL: z.string().url().default('http://localhost:9870'),
    HDFS_PATH: z.string().startsWith('/', 'HDFS_PATH must be an absolute path').default('/user/journals'),
    HDFS_USER: z.string().optional(),
    HDFS_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
});
