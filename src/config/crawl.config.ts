// src/config/crawl.config.ts
import { AppConfig, CrawlSettings } from './types';

export class CrawlConfiguration {
    public readonly portalUrl: string;
    public readonly maxPages: number;
    public readonly waitTimeoutMs: number;
    public readonly shortWaitTimeoutMs: number;
    public readonly graceDelayMs: number;
    public readonly settleDelayMs: number;

    public readonly filterToggleSelector: string;
    public readonly filterPanelSelector: string;
    public readonly accreditationCheckboxSelector: string;
    public readonly filterSubmitSelector: string;
    public readonly resultsSelector: string;
    public readonly nextPageSelector: string;

    constructor(appConfig: AppConfig) {
        this.portalUrl = appConfig.PORTAL_URL;
        this.maxPages = appConfig.CRAWL_MAX_PAGES;
        this.waitTimeoutMs = appConfig.CRAWL_WAIT_TIMEOUT_MS;
        this.shortWaitTimeoutMs = appConfig.CRAWL_SHORT_WAIT_TIMEOUT_MS;
        this.graceDelayMs = appConfig.CRAWL_GRACE_DELAY_MS;
        this.settleDelayMs = appConfig.CRAWL_SETTLE_DELAY_MS;

        this.filterToggleSelector = appConfig.CRAWL_SELECTOR_FILTER_TOGGLE;
        this.filterPanelSelector = appConfig.CRAWL_SELECTOR_FILTER_PANEL;
        this.accreditationCheckboxSelector = appConfig.CRAWL_SELECTOR_ACCREDITATION_CHECKBOX;
        this.filterSubmitSelector = appConfig.CRAWL_SELECTOR_FILTER_SUBMIT;
        this.resultsSelector = appConfig.CRAWL_SELECTOR_RESULTS;
        this.nextPageSelector = appConfig.CRAWL_SELECTOR_NEXT_PAGE;
    }

    public get settings(): CrawlSettings {
        return {
            portalUrl: this.portalUrl,
            maxPages: this.maxPages,
            waitTimeoutMs: this.waitTimeoutMs,
            shortWaitTimeoutMs: this.shortWaitTimeoutMs,
            graceDelayMs: this.graceDelayMs,
            settleDelayMs: this.settleDelayMs,
            selectors: {
                filterToggle: this.filterToggleSelector,
                filterPanel: this.filterPanelSelector,
                accreditationCheckbox: this.accreditationCheckboxSelector,
                filterSubmit: this.filterSubmitSelector,
                results: this.resultsSelector,
                nextPage: this.nextPageSelector,
            },
        };
    }
}
