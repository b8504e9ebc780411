// src/journal/crawlStateMachine.ts
import { Logger } from 'pino';
import { CrawlSettings } from '../config/types';
import { CrawlNavigationError, getErrorMessageAndStack } from '../utils/errorUtils';
import { createRawPageCapture, RawPageCapture } from '../types/journal.types';
import {
    CaptureArchive,
    CaptureOutcome,
    CaptureSource,
    CrawlDiagnosticsSink,
    CrawlState,
    CrawlTerminationReason,
    CrawlTransition,
    PageRenderer,
} from '../types/crawl.types';

export type CrawlStep =
    | 'navigate'
    | 'open_filter'
    | 'select_accreditation'
    | 'submit_filter'
    | 'capture'
    | 'find_next'
    | 'advance';

const ALLOWED_TRANSITIONS: Record<CrawlState, readonly CrawlState[]> = {
    initializing: ['filter_applied', 'aborted'],
    filter_applied: ['page_captured', 'aborted'],
    page_captured: ['advancing', 'done', 'aborted'],
    advancing: ['page_captured', 'aborted'],
    done: [],
    aborted: [],
};

export interface CrawlStateMachineOptions {
    settings: CrawlSettings;
    logger: Logger;
    diagnostics?: CrawlDiagnosticsSink;
    archive?: CaptureArchive;
    delay?: (ms: number) => Promise<void>;
    now?: () => Date;
}

const sleep = (ms: number): Promise<void> => new Promise(resolve => setTimeout(resolve, ms));

/**
 * A pagination control is inert when it is disabled by attribute, styling or
 * accessibility state, or when it has nowhere to navigate to.
 */
export function isNavigationControlInert(attributes: Readonly<Record<string, string>>): boolean {
    if (attributes['disabled'] !== undefined) {
        return true;
    }
    if ((attributes['class'] ?? '').includes('disabled')) {
        return true;
    }
    if ((attributes['aria-disabled'] ?? '').trim().toLowerCase() === 'true') {
        return true;
    }
    const href = (attributes['href'] ?? '').trim();
    return href === '' || href === '#' || href.toLowerCase().startsWith('javascript:');
}

export function isCheckboxChecked(attributes: Readonly<Record<string, string>>): boolean {
    const checked = attributes['checked'];
    return checked !== undefined && checked.toLowerCase() !== 'false';
}

type NextControl<TElement> =
    | { kind: 'stop'; reason: Exclude<CrawlTerminationReason, 'navigation_failure'> }
    | { kind: 'advance'; element: TElement };

/**
 * Walks the filtered listing one page at a time. Only the absence or
 * inertness of the "next" control ends the walk normally; `maxPages` caps it.
 *
 * Single use: `captures()` may be iterated once.
 */
export class JournalCrawlStateMachine<TElement> implements CaptureSource {
    public readonly description: string;

    private state: CrawlState = 'initializing';
    private step: CrawlStep = 'navigate';
    private sequence = 0;
    private archived = 0;
    private started = false;
    private readonly history: CrawlTransition[] = [];
    private readonly archiveErrors: string[] = [];

    private readonly settings: CrawlSettings;
    private readonly logger: Logger;
    private readonly diagnostics?: CrawlDiagnosticsSink;
    private readonly archive?: CaptureArchive;
    private readonly delay: (ms: number) => Promise<void>;
    private readonly now: () => Date;

    constructor(private readonly renderer: PageRenderer<TElement>, options: CrawlStateMachineOptions) {
        this.settings = options.settings;
        this.logger = options.logger.child({ service: 'JournalCrawlStateMachine' });
        this.diagnostics = options.diagnostics;
        this.archive = options.archive;
        this.delay = options.delay ?? sleep;
        this.now = options.now ?? (() => new Date());
        this.description = `live crawl of ${this.settings.portalUrl}`;
    }

    get currentState(): CrawlState {
        return this.state;
    }

    get transitions(): readonly CrawlTransition[] {
        return this.history;
    }

    /** Captures the archive accepted so far. */
    get pagesArchived(): number {
        return this.archived;
    }

    public async *captures(): AsyncGenerator<RawPageCapture, CaptureOutcome, void> {
        if (this.started) {
            throw new Error('Crawl state machine has already been started');
        }
        this.started = true;
        this.logger.info({ event: 'crawl_start', portalUrl: this.settings.portalUrl, maxPages: this.settings.maxPages }, 'Starting listing crawl.');

        try {
            await this.applyFilter();
            this.transition('filter_applied');
            yield await this.capturePage();

            for (; ;) {
                const next = await this.findNextControl();
                if (next.kind === 'stop') {
                    this.transition('done');
                    this.logger.info({ event: 'crawl_done', reason: next.reason, pagesCaptured: this.sequence }, `Crawl finished after ${this.sequence} page(s): ${next.reason}.`);
                    return { status: 'done', reason: next.reason, pagesCaptured: this.sequence, errors: [...this.archiveErrors] };
                }
                this.transition('advancing');
                await this.advance(next.element);
                yield await this.capturePage();
            }
        } catch (error) {
            return await this.abort(error);
        }
    }

    private transition(to: CrawlState): void {
        const from = this.state;
        if (!ALLOWED_TRANSITIONS[from].includes(to)) {
            throw new Error(`Illegal crawl transition ${from} -> ${to}`);
        }
        this.state = to;
        this.history.push({ from, to, at: this.now(), sequenceNumber: this.sequence });
        this.logger.debug({ event: 'crawl_state_transition', from, to, sequenceNumber: this.sequence }, `${from} -> ${to}`);
    }

    private async requireElement(selector: string, timeoutMs: number, description: string): Promise<TElement> {
        const waited = await this.renderer.waitForElement(selector, timeoutMs);
        const element = waited === 'found' ? await this.renderer.findElement(selector) : null;
        if (element === null) {
            throw new CrawlNavigationError(`${description} (${selector}) did not appear within ${timeoutMs} ms`, this.step);
        }
        return element;
    }

    private async waitForResults(): Promise<void> {
        const { results } = this.settings.selectors;
        const waited = await this.renderer.waitForElement(results, this.settings.waitTimeoutMs);
        if (waited === 'timeout') {
            this.logger.warn({ event: 'results_wait_timeout', selector: results, graceDelayMs: this.settings.graceDelayMs }, 'Results marker did not appear in time; continuing after grace delay.');
            await this.delay(this.settings.graceDelayMs);
        }
    }

    private async applyFilter(): Promise<void> {
        const { selectors, waitTimeoutMs, shortWaitTimeoutMs } = this.settings;

        this.step = 'navigate';
        await this.renderer.navigate(this.settings.portalUrl);

        this.step = 'open_filter';
        const toggle = await this.requireElement(selectors.filterToggle, waitTimeoutMs, 'Filter toggle');
        await this.renderer.click(toggle);
        if (await this.renderer.waitForElement(selectors.filterPanel, shortWaitTimeoutMs) === 'timeout') {
            this.logger.warn({ event: 'filter_panel_wait_timeout', selector: selectors.filterPanel }, 'Filter panel not visible yet; continuing.');
        }

        this.step = 'select_accreditation';
        const checkbox = await this.requireElement(selectors.accreditationCheckbox, waitTimeoutMs, 'Accreditation checkbox');
        if (isCheckboxChecked(await this.renderer.elementAttributes(checkbox))) {
            this.logger.debug({ event: 'accreditation_already_selected' }, 'Accreditation criterion already selected.');
        } else {
            await this.renderer.click(checkbox);
        }

        this.step = 'submit_filter';
        const submit = await this.requireElement(selectors.filterSubmit, shortWaitTimeoutMs, 'Filter submit button');
        await this.renderer.click(submit);
        await this.waitForResults();
    }

    private async capturePage(): Promise<RawPageCapture> {
        this.step = 'capture';
        const markup = await this.renderer.currentMarkup();
        this.sequence += 1;
        const capture = createRawPageCapture(this.sequence, markup, this.now());
        this.transition('page_captured');
        this.logger.info({ event: 'page_captured', sequenceNumber: capture.sequenceNumber, markupLength: markup.length }, `Captured page ${capture.sequenceNumber}.`);

        if (this.archive) {
            try {
                if (await this.archive.archiveCapture(capture) !== null) {
                    this.archived += 1;
                }
            } catch (error) {
                const { message } = getErrorMessageAndStack(error);
                const archiveError = `Could not archive page ${capture.sequenceNumber}: ${message}`;
                this.archiveErrors.push(archiveError);
                this.logger.warn({ event: 'capture_archive_failed', sequenceNumber: capture.sequenceNumber, err: { message } }, archiveError);
            }
        }
        return capture;
    }

    private async findNextControl(): Promise<NextControl<TElement>> {
        if (this.sequence >= this.settings.maxPages) {
            return { kind: 'stop', reason: 'page_cap_reached' };
        }
        this.step = 'find_next';
        const element = await this.renderer.findElement(this.settings.selectors.nextPage);
        if (element === null) {
            return { kind: 'stop', reason: 'next_control_absent' };
        }
        const attributes = await this.renderer.elementAttributes(element);
        if (isNavigationControlInert(attributes)) {
            this.logger.debug({ event: 'next_control_inert', attributes }, 'Next control is disabled.');
            return { kind: 'stop', reason: 'next_control_disabled' };
        }
        return { kind: 'advance', element };
    }

    private async advance(element: TElement): Promise<void> {
        this.step = 'advance';
        await this.renderer.click(element);
        await this.delay(this.settings.settleDelayMs);
        await this.waitForResults();
    }

    private async abort(error: unknown): Promise<CaptureOutcome> {
        const { message, stack } = getErrorMessageAndStack(error);
        const step = error instanceof CrawlNavigationError ? error.step : this.step;
        this.logger.error({ event: 'crawl_aborted', step, pagesCaptured: this.sequence, err: { message, stack } }, `Crawl aborted during ${step}: ${message}`);

        const diagnostics = await this.captureDiagnostics(`${step}: ${message}`);
        if (this.state !== 'done' && this.state !== 'aborted') {
            this.transition('aborted');
        }
        return {
            status: 'aborted',
            reason: 'navigation_failure',
            pagesCaptured: this.sequence,
            step,
            message,
            diagnostics,
            errors: [...this.archiveErrors, `Crawl aborted during ${step} after ${this.sequence} page(s): ${message}`],
        };
    }

    // Best effort: nothing in here may change how the abort ends.
    private async captureDiagnostics(reason: string): Promise<string[]> {
        if (!this.diagnostics) {
            return [];
        }
        let markup: string | undefined;
        let screenshot: Buffer | undefined;
        try {
            markup = await this.renderer.currentMarkup();
        } catch (error) {
            this.logger.warn({ event: 'diagnostics_markup_failed', err: { message: getErrorMessageAndStack(error).message } }, 'Could not read page markup for diagnostics.');
        }
        try {
            screenshot = await this.renderer.screenshot();
        } catch (error) {
            this.logger.warn({ event: 'diagnostics_screenshot_failed', err: { message: getErrorMessageAndStack(error).message } }, 'Could not take a screenshot for diagnostics.');
        }
        try {
            const locations = await this.diagnostics.saveDiagnostics({ reason, markup, screenshot });
            this.logger.info({ event: 'diagnostics_saved', locations }, 'Saved crawl diagnostics.');
            return locations;
        } catch (error) {
            this.logger.warn({ event: 'diagnostics_save_failed', err: { message: getErrorMessageAndStack(error).message } }, 'Could not save crawl diagnostics.');
            return [];
        }
    }
}
