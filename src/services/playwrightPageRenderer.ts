// src/services/playwrightPageRenderer.ts
import { ElementHandle, Page, errors } from 'playwright-core';
import { Logger } from 'pino';
import { PageRenderer, WaitResult } from '../types/crawl.types';

export type PortalElement = ElementHandle<SVGElement | HTMLElement>;

/**
 * `PageRenderer` over one Playwright page.
 */
export class PlaywrightPageRenderer implements PageRenderer<PortalElement> {
    private readonly logger: Logger;

    constructor(private readonly page: Page, private readonly navigationTimeoutMs: number, parentLogger: Logger) {
        this.logger = parentLogger.child({ service: 'PlaywrightPageRenderer' });
    }

    async navigate(url: string): Promise<void> {
        this.logger.debug({ event: 'renderer_navigate', url }, `Navigating to ${url}`);
        await this.page.goto(url, { waitUntil: 'domcontentloaded', timeout: this.navigationTimeoutMs });
    }

    async waitForElement(selector: string, timeoutMs: number): Promise<WaitResult> {
        try {
            await this.page.waitForSelector(selector, { state: 'visible', timeout: timeoutMs });
            return 'found';
        } catch (error) {
            if (error instanceof errors.TimeoutError) {
                return 'timeout';
            }
            throw error;
        }
    }

    // Fires the click event directly, without scrolling or hit-testing.
    async click(element: PortalElement): Promise<void> {
        await element.dispatchEvent('click');
    }

    async currentMarkup(): Promise<string> {
        return this.page.content();
    }

    async findElement(selector: string): Promise<PortalElement | null> {
        return this.page.$(selector);
    }

    async elementAttributes(element: PortalElement): Promise<Record<string, string>> {
        return element.evaluate(node => {
            const attributes: Record<string, string> = {};
            for (const attribute of Array.from(node.attributes)) {
                attributes[attribute.name] = attribute.value;
            }
            if (node instanceof HTMLInputElement) {
                if (node.checked) {
                    attributes['checked'] = 'true';
                } else {
                    delete attributes['checked'];
                }
            }
            return attributes;
        });
    }

    async screenshot(): Promise<Buffer> {
        return this.page.screenshot({ fullPage: true });
    }
}
