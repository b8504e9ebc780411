// src/journal/__fixtures__/scriptedRenderer.ts
import { CrawlSettings } from '../../config/types';
import { PageRenderer, WaitResult } from '../../types/crawl.types';

export interface ScriptedElement {
    selector: string;
}

export interface ScriptedPage {
    markup: string;
    /** Attributes of the "next" control; null when the page has none. */
    next: Record<string, string> | null;
}

export interface RendererCall {
    method: keyof PageRenderer<ScriptedElement>;
    selector?: string;
    pageIndex: number;
}

export interface ScriptedRendererOptions {
    checkboxChecked?: boolean;
    /** Selectors whose wait always times out and which are never found. */
    missing?: string[];
    /** Selectors whose wait times out although the element is there. */
    slow?: string[];
    failWhen?: (call: RendererCall) => boolean;
}

export const TEST_SELECTORS = {
    filterToggle: '#toggle',
    filterPanel: '#panel',
    accreditationCheckbox: '#accredited',
    filterSubmit: '#submit',
    results: 'table.results',
    nextPage: 'a.next',
} as const;

export function testCrawlSettings(overrides: Partial<CrawlSettings> = {}): CrawlSettings {
    return {
        portalUrl: 'https://portal.example/journals',
        selectors: { ...TEST_SELECTORS },
        maxPages: 23,
        waitTimeoutMs: 700,
        shortWaitTimeoutMs: 100,
        graceDelayMs: 50,
        settleDelayMs: 10,
        ...overrides,
    };
}

export const ENABLED_NEXT: Record<string, string> = { class: 'page-link', href: '?page=next' };

/**
 * In-process stand-in for a browser: a fixed list of pages, a "next" control
 * per page, and a call log.
 */
export class ScriptedPageRenderer implements PageRenderer<ScriptedElement> {
    public readonly calls: RendererCall[] = [];
    public pageIndex = 0;
    public checkboxChecked: boolean;

    constructor(private readonly pages: ScriptedPage[], private readonly options: ScriptedRendererOptions = {}) {
        this.checkboxChecked = options.checkboxChecked ?? false;
    }

    private record(method: RendererCall['method'], selector?: string): void {
        const call: RendererCall = { method, selector, pageIndex: this.pageIndex };
        this.calls.push(call);
        if (this.options.failWhen?.(call)) {
            throw new Error(`${method} failed${selector ? ` on ${selector}` : ''}`);
        }
    }

    private isMissing(selector: string): boolean {
        return (this.options.missing ?? []).includes(selector);
    }

    private get currentPage(): ScriptedPage {
        const page = this.pages.at(this.pageIndex);
        if (!page) {
            throw new Error(`No scripted page at index ${this.pageIndex}`);
        }
        return page;
    }

    async navigate(url: string): Promise<void> {
        this.record('navigate', url);
    }

    async waitForElement(selector: string): Promise<WaitResult> {
        this.record('waitForElement', selector);
        return this.isMissing(selector) || (this.options.slow ?? []).includes(selector) ? 'timeout' : 'found';
    }

    async click(element: ScriptedElement): Promise<void> {
        this.record('click', element.selector);
        if (element.selector === TEST_SELECTORS.nextPage) {
            this.pageIndex += 1;
        } else if (element.selector === TEST_SELECTORS.accreditationCheckbox) {
            this.checkboxChecked = !this.checkboxChecked;
        }
    }

    async currentMarkup(): Promise<string> {
        this.record('currentMarkup');
        return this.currentPage.markup;
    }

    async findElement(selector: string): Promise<ScriptedElement | null> {
        this.record('findElement', selector);
        if (this.isMissing(selector)) {
            return null;
        }
        if (selector === TEST_SELECTORS.nextPage && this.currentPage.next === null) {
            return null;
        }
        return { selector };
    }

    async elementAttributes(element: ScriptedElement): Promise<Record<string, string>> {
        this.record('elementAttributes', element.selector);
        if (element.selector === TEST_SELECTORS.nextPage) {
            return { ...(this.currentPage.next ?? {}) };
        }
        if (element.selector === TEST_SELECTORS.accreditationCheckbox) {
            return this.checkboxChecked
                ? { id: 'accredited', type: 'checkbox', checked: '' }
                : { id: 'accredited', type: 'checkbox' };
        }
        return {};
    }

    async screenshot(): Promise<Buffer> {
        this.record('screenshot');
        return Buffer.from('fake-png');
    }

    clicksOn(selector: string): number {
        return this.calls.filter(call => call.method === 'click' && call.selector === selector).length;
    }
}

/**
 * `count` pages whose "next" control is enabled on all but the last, which has
 * the given attributes (or no control at all).
 */
export function scriptedPages(count: number, lastNext: Record<string, string> | null, markupFor: (n: number) => string = n => `<html><body><p>page ${n}</p></body></html>`): ScriptedPage[] {
    return Array.from({ length: count }, (_, i) => ({
        markup: markupFor(i + 1),
        next: i === count - 1 ? lastNext : { ...ENABLED_NEXT },
    }));
}

export async function drain<T, R>(generator: AsyncGenerator<T, R, void>): Promise<{ items: T[]; result: R }> {
    const items: T[] = [];
    for (; ;) {
        const step = await generator.next();
        if (step.done) {
            return { items, result: step.value };
        }
        items.push(step.value);
    }
}
