// src/journal/crawlStateMachine.test.ts
import pino from 'pino';
import { CaptureArchive, CrawlDiagnostics, CrawlDiagnosticsSink } from '../types/crawl.types';
import { RawPageCapture } from '../types/journal.types';
import { isCheckboxChecked, isNavigationControlInert, JournalCrawlStateMachine } from './crawlStateMachine';
import {
    drain,
    ENABLED_NEXT,
    scriptedPages,
    ScriptedPageRenderer,
    TEST_SELECTORS,
    testCrawlSettings,
} from './__fixtures__/scriptedRenderer';

const logger = pino({ level: 'silent' });

function machineFor(renderer: ScriptedPageRenderer, extra: { maxPages?: number; diagnostics?: CrawlDiagnosticsSink; archive?: CaptureArchive } = {}) {
    const delays: number[] = [];
    const machine = new JournalCrawlStateMachine(renderer, {
        settings: testCrawlSettings(extra.maxPages === undefined ? {} : { maxPages: extra.maxPages }),
        logger,
        diagnostics: extra.diagnostics,
        archive: extra.archive,
        delay: async ms => {
            delays.push(ms);
        },
        now: () => new Date('2026-03-01T12:00:00.000Z'),
    });
    return { machine, delays };
}

describe('JournalCrawlStateMachine', () => {
    it('stops at the page whose next control is disabled', async () => {
        const renderer = new ScriptedPageRenderer(scriptedPages(5, { class: 'page-link', href: '?page=6', disabled: '' }));
        const { machine, delays } = machineFor(renderer);

        const { items, result } = await drain(machine.captures());

        expect(items.map(capture => capture.sequenceNumber)).toEqual([1, 2, 3, 4, 5]);
        expect(items[4].markup).toBe('<html><body><p>page 5</p></body></html>');
        expect(result).toEqual({ status: 'done', reason: 'next_control_disabled', pagesCaptured: 5, errors: [] });
        expect(machine.currentState).toBe('done');
        expect(machine.transitions.some(t => t.to === 'aborted')).toBe(false);
        expect(machine.transitions).toHaveLength(11);
        expect(delays).toEqual([10, 10, 10, 10]);
    });

    it('stops when the next control is absent', async () => {
        const renderer = new ScriptedPageRenderer(scriptedPages(3, null));
        const { machine } = machineFor(renderer);

        const { items, result } = await drain(machine.captures());

        expect(items).toHaveLength(3);
        expect(result).toEqual({ status: 'done', reason: 'next_control_absent', pagesCaptured: 3, errors: [] });
    });

    it.each([1, 2, 7])('never captures more than a cap of %i pages', async cap => {
        const renderer = new ScriptedPageRenderer(scriptedPages(10, { ...ENABLED_NEXT }));
        const { machine } = machineFor(renderer, { maxPages: cap });

        const { items, result } = await drain(machine.captures());

        expect(items).toHaveLength(cap);
        expect(result).toEqual({ status: 'done', reason: 'page_cap_reached', pagesCaptured: cap, errors: [] });
        expect(renderer.clicksOn(TEST_SELECTORS.nextPage)).toBe(cap - 1);
    });

    it('selects the accreditation criterion only when it is not already selected', async () => {
        const unchecked = new ScriptedPageRenderer(scriptedPages(1, null));
        await drain(machineFor(unchecked).machine.captures());
        expect(unchecked.clicksOn(TEST_SELECTORS.accreditationCheckbox)).toBe(1);
        expect(unchecked.checkboxChecked).toBe(true);

        const checked = new ScriptedPageRenderer(scriptedPages(1, null), { checkboxChecked: true });
        await drain(machineFor(checked).machine.captures());
        expect(checked.clicksOn(TEST_SELECTORS.accreditationCheckbox)).toBe(0);
        expect(checked.clicksOn(TEST_SELECTORS.filterSubmit)).toBe(1);
    });

    it('continues after a grace delay when the results marker is slow', async () => {
        const renderer = new ScriptedPageRenderer(scriptedPages(2, null), { slow: [TEST_SELECTORS.results] });
        const { machine, delays } = machineFor(renderer);

        const { items, result } = await drain(machine.captures());

        expect(items).toHaveLength(2);
        expect(result.status).toBe('done');
        expect(delays).toEqual([50, 10, 50]);
    });

    it('aborts when a required filter control never appears', async () => {
        const renderer = new ScriptedPageRenderer(scriptedPages(3, null), { missing: [TEST_SELECTORS.filterToggle] });
        const { machine } = machineFor(renderer);

        const { items, result } = await drain(machine.captures());

        expect(items).toEqual([]);
        expect(result).toEqual({
            status: 'aborted',
            reason: 'navigation_failure',
            pagesCaptured: 0,
            step: 'open_filter',
            message: 'Filter toggle (#toggle) did not appear within 700 ms',
            diagnostics: [],
            errors: ['Crawl aborted during open_filter after 0 page(s): Filter toggle (#toggle) did not appear within 700 ms'],
        });
        expect(machine.transitions.map(t => [t.from, t.to])).toEqual([['initializing', 'aborted']]);
    });

    it('keeps the pages captured before a renderer failure and saves diagnostics', async () => {
        const received: CrawlDiagnostics[] = [];
        const diagnostics: CrawlDiagnosticsSink = {
            saveDiagnostics: async input => {
                received.push(input);
                return ['diag/abort.html', 'diag/abort.png'];
            },
        };
        const renderer = new ScriptedPageRenderer(scriptedPages(4, null), {
            failWhen: call => call.method === 'click' && call.selector === TEST_SELECTORS.nextPage && call.pageIndex === 1,
        });
        const { machine } = machineFor(renderer, { diagnostics });

        const { items, result } = await drain(machine.captures());

        expect(items.map(capture => capture.sequenceNumber)).toEqual([1, 2]);
        expect(result).toEqual({
            status: 'aborted',
            reason: 'navigation_failure',
            pagesCaptured: 2,
            step: 'advance',
            message: 'click failed on a.next',
            diagnostics: ['diag/abort.html', 'diag/abort.png'],
            errors: ['Crawl aborted during advance after 2 page(s): click failed on a.next'],
        });
        expect(received).toEqual([{
            reason: 'advance: click failed on a.next',
            markup: '<html><body><p>page 2</p></body></html>',
            screenshot: Buffer.from('fake-png'),
        }]);
        expect(machine.transitions.slice(-2).map(t => t.to)).toEqual(['advancing', 'aborted']);
        expect(machine.currentState).toBe('aborted');
    });

    it('still aborts cleanly when the diagnostics cannot be saved', async () => {
        const diagnostics: CrawlDiagnosticsSink = {
            saveDiagnostics: async () => {
                throw new Error('disk full');
            },
        };
        const renderer = new ScriptedPageRenderer(scriptedPages(2, null), {
            failWhen: call => call.method === 'navigate' || call.method === 'screenshot',
        });
        const { machine } = machineFor(renderer, { diagnostics });

        const { result } = await drain(machine.captures());

        expect(result).toMatchObject({ status: 'aborted', step: 'navigate', message: 'navigate failed on https://portal.example/journals', diagnostics: [] });
        expect(machine.currentState).toBe('aborted');
    });

    it('hands every capture to the archive and reports archive failures', async () => {
        const archived: number[] = [];
        const archive: CaptureArchive = {
            archiveCapture: async (capture: RawPageCapture) => {
                archived.push(capture.sequenceNumber);
                if (capture.sequenceNumber === 2) {
                    throw new Error('read-only directory');
                }
                return `page${capture.sequenceNumber}.html`;
            },
        };
        const renderer = new ScriptedPageRenderer(scriptedPages(3, null));
        const { machine } = machineFor(renderer, { archive });

        const { items, result } = await drain(machine.captures());

        expect(items).toHaveLength(3);
        expect(archived).toEqual([1, 2, 3]);
        expect(result).toEqual({
            status: 'done',
            reason: 'next_control_absent',
            pagesCaptured: 3,
            errors: ['Could not archive page 2: read-only directory'],
        });
        expect(machine.pagesArchived).toBe(2);
    });

    it('reports every archive failure when the archive rejects all captures', async () => {
        const archive: CaptureArchive = {
            archiveCapture: async () => {
                throw new Error('ENOSPC: no space left on device');
            },
        };
        const renderer = new ScriptedPageRenderer(scriptedPages(2, null));
        const { machine } = machineFor(renderer, { archive });

        const { result } = await drain(machine.captures());

        expect(result.errors).toEqual([
            'Could not archive page 1: ENOSPC: no space left on device',
            'Could not archive page 2: ENOSPC: no space left on device',
        ]);
        expect(machine.pagesArchived).toBe(0);
    });

    it('keeps archive failures ahead of the abort message', async () => {
        const archive: CaptureArchive = {
            archiveCapture: async () => {
                throw new Error('read-only directory');
            },
        };
        const renderer = new ScriptedPageRenderer(scriptedPages(3, ENABLED_NEXT), {
            failWhen: call => call.method === 'click' && call.pageIndex === 1,
        });
        const { machine } = machineFor(renderer, { archive });

        const { result } = await drain(machine.captures());

        expect(result.status).toBe('aborted');
        expect(result.errors[0]).toBe('Could not archive page 1: read-only directory');
        expect(result.errors[2]).toMatch(/^Crawl aborted during advance after 2 page\(s\): /);
    });

    it('can only be iterated once', async () => {
        const renderer = new ScriptedPageRenderer(scriptedPages(1, null));
        const { machine } = machineFor(renderer);
        await drain(machine.captures());

        await expect(machine.captures().next()).rejects.toThrow('Crawl state machine has already been started');
    });
});

describe('isNavigationControlInert', () => {
    it.each<[string, Record<string, string>, boolean]>([
        ['an enabled link', { class: 'page-link', href: '/journals?page=2' }, false],
        ['a disabled attribute', { href: '/journals?page=2', disabled: '' }, true],
        ['disabled styling', { class: 'page-link disabled', href: '/journals?page=2' }, true],
        ['aria-disabled', { href: '/journals?page=2', 'aria-disabled': 'true' }, true],
        ['aria-disabled false', { href: '/journals?page=2', 'aria-disabled': 'false' }, false],
        ['a missing href', { class: 'page-link' }, true],
        ['a blank href', { href: '  ' }, true],
        ['a script href', { href: 'javascript:void(0)' }, true],
        ['a fragment-only href', { href: '#' }, true],
    ])('treats %s correctly', (_label, attributes, inert) => {
        expect(isNavigationControlInert(attributes)).toBe(inert);
    });
});

describe('isCheckboxChecked', () => {
    it('reads the reflected checked state', () => {
        expect(isCheckboxChecked({ checked: '' })).toBe(true);
        expect(isCheckboxChecked({ checked: 'checked' })).toBe(true);
        expect(isCheckboxChecked({ checked: 'false' })).toBe(false);
        expect(isCheckboxChecked({ type: 'checkbox' })).toBe(false);
    });
});
