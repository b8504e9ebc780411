// src/services/playwright.service.ts
import 'reflect-metadata';
import { singleton, inject } from 'tsyringe';
import { chromium, Browser, BrowserContext, Page, Route } from 'playwright-core';
import { Logger } from 'pino';
import { ConfigService } from '../config/config.service';
import { LoggingService } from './logging.service';
import { getErrorMessageAndStack } from '../utils/errorUtils';

const BLOCKED_RESOURCE_TYPES = ['image', 'media', 'font'];
const BLOCKED_URL_FRAGMENTS = ['google-analytics', 'googletagmanager', 'doubleclick.net'];

/**
 * Owns the single browser and context used by live crawls. The listing
 * portal renders its filter and pagination with scripts, so JavaScript stays
 * on; images, media, fonts and trackers are blocked.
 */
@singleton()
export class PlaywrightService {
    private browser: Browser | null = null;
    private browserContext: BrowserContext | null = null;
    private readonly serviceBaseLogger: Logger;

    constructor(
        @inject(LoggingService) private readonly loggingService: LoggingService,
        @inject(ConfigService) private readonly configService: ConfigService,
    ) {
        this.serviceBaseLogger = this.loggingService.getLogger({ service: 'PlaywrightServiceBase' });
    }

    private getMethodLogger(parentLogger: Logger | undefined, methodName: string): Logger {
        const base = parentLogger || this.serviceBaseLogger;
        return base.child({ serviceMethod: `PlaywrightService.${methodName}` });
    }

    async initialize(parentLogger?: Logger): Promise<void> {
        const logger = this.getMethodLogger(parentLogger, 'initialize');
        if (this.browserContext) {
            logger.debug({ event: 'playwright_already_initialized' }, 'Playwright is already initialized.');
            return;
        }

        const { channel, headless, userAgent } = this.configService.browserSettings;
        logger.info({ event: 'playwright_initialize_start', channel, headless }, 'Launching browser...');

        let browser: Browser | null = null;
        try {
            browser = await chromium.launch({
                channel,
                headless,
                args: [
                    '--disable-notifications',
                    '--disable-geolocation',
                    '--disable-extensions',
                    '--no-sandbox',
                    '--disable-setuid-sandbox',
                    '--disable-gpu',
                    '--disable-dev-shm-usage',
                ],
                timeout: 30000,
            });
            const context = await browser.newContext({
                permissions: [],
                viewport: { width: 1280, height: 720 },
                ignoreHTTPSErrors: true,
                userAgent,
                javaScriptEnabled: true,
            });
            await context.route('**/*', (route: Route) => this.handleRoute(route, logger));

            this.browser = browser;
            this.browserContext = context;
            logger.info({ event: 'playwright_initialize_success' }, 'Browser and context ready.');
        } catch (error: unknown) {
            const { message, stack } = getErrorMessageAndStack(error);
            logger.fatal({ err: { message, stack }, event: 'playwright_initialize_failed' }, `Failed to initialize Playwright browser: "${message}".`);
            if (browser) {
                await browser.close().catch(closeError => {
                    logger.error({ err: getErrorMessageAndStack(closeError), event: 'playwright_browser_close_after_failure_error' }, 'Error closing browser after launch failure.');
                });
            }
            throw error;
        }
    }

    private handleRoute(route: Route, logger: Logger): Promise<void> {
        const request = route.request();
        const url = request.url();
        const blocked = BLOCKED_RESOURCE_TYPES.includes(request.resourceType())
            || BLOCKED_URL_FRAGMENTS.some(fragment => url.includes(fragment));
        const action = blocked ? route.abort() : route.continue();
        return action.catch(error => {
            logger.warn({ err: getErrorMessageAndStack(error).message, url, event: blocked ? 'route_abort_error' : 'route_continue_error' }, `Route handling failed for ${url}.`);
        });
    }

    async newPage(parentLogger?: Logger): Promise<Page> {
        const logger = this.getMethodLogger(parentLogger, 'newPage');
        if (!this.browserContext) {
            const errorMsg = 'Browser page requested before Playwright was initialized.';
            logger.error({ event: 'playwright_context_unavailable_error' }, errorMsg);
            throw new Error(errorMsg);
        }
        return this.browserContext.newPage();
    }

    async close(parentLogger?: Logger): Promise<void> {
        const logger = this.getMethodLogger(parentLogger, 'close');
        if (!this.browser) {
            logger.debug({ event: 'playwright_close_skipped_not_initialized' }, 'Browser was not running.');
            return;
        }
        try {
            await this.browser.close();
            logger.info({ event: 'playwright_close_success' }, 'Browser closed.');
        } catch (error: unknown) {
            const { message, stack } = getErrorMessageAndStack(error);
            logger.error({ err: { message, stack }, event: 'playwright_close_failed' }, `Error closing Playwright browser: "${message}".`);
        } finally {
            this.browser = null;
            this.browserContext = null;
        }
    }
}
