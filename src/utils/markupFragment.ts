// src/utils/markupFragment.ts
import * as cheerio from 'cheerio';
import { AnyNode, Element, hasChildren, isTag, isText } from 'domhandler';

/**
 * Structural marker: an element tag, a class set that must be fully present on
 * the element, and optional attribute predicates (exact value or pattern).
 */
export interface FragmentMarker {
    readonly tag: string;
    readonly classes?: readonly string[];
    readonly attributes?: Readonly<Record<string, string | RegExp>>;
}

export interface TextOptions {
    /** Trim every text node and join the non-empty pieces without a separator. */
    strip?: boolean;
}

/**
 * Read-only view over one node of a parsed markup tree.
 */
export interface MarkupFragment {
    findFirst(marker: FragmentMarker): MarkupFragment | null;
    findAll(marker: FragmentMarker): MarkupFragment[];
    attr(name: string): string | null;
    text(options?: TextOptions): string;
    outerMarkup(): string;
}

export class MarkupParseError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'MarkupParseError';
    }
}

export function matchesMarker(element: Element, marker: FragmentMarker): boolean {
    if (element.name.toLowerCase() !== marker.tag.toLowerCase()) {
        return false;
    }
    if (marker.classes && marker.classes.length > 0) {
        const classList = (element.attribs['class'] ?? '').split(/\s+/).filter(Boolean);
        if (!marker.classes.every(cls => classList.includes(cls))) {
            return false;
        }
    }
    for (const [name, expected] of Object.entries(marker.attributes ?? {})) {
        const value = element.attribs[name];
        if (value === undefined) {
            return false;
        }
        if (typeof expected === 'string' ? value !== expected : !expected.test(value)) {
            return false;
        }
    }
    return true;
}

function collectTextNodes(nodes: readonly AnyNode[], into: string[]): void {
    for (const node of nodes) {
        if (isText(node)) {
            into.push(node.data);
        } else if (hasChildren(node)) {
            collectTextNodes(node.children, into);
        }
    }
}

class CheerioMarkupFragment implements MarkupFragment {
    constructor(
        private readonly $: cheerio.CheerioAPI,
        private readonly node: AnyNode,
    ) { }

    public findFirst(marker: FragmentMarker): MarkupFragment | null {
        const match = this.matchingElements(marker).at(0);
        return match ? new CheerioMarkupFragment(this.$, match) : null;
    }

    public findAll(marker: FragmentMarker): MarkupFragment[] {
        return this.matchingElements(marker).map(element => new CheerioMarkupFragment(this.$, element));
    }

    public attr(name: string): string | null {
        if (!isTag(this.node)) {
            return null;
        }
        return this.node.attribs[name] ?? null;
    }

    public text(options: TextOptions = {}): string {
        const pieces: string[] = [];
        collectTextNodes([this.node], pieces);
        if (!options.strip) {
            return pieces.join('');
        }
        return pieces.map(piece => piece.trim()).filter(piece => piece.length > 0).join('');
    }

    public outerMarkup(): string {
        return this.$.html(this.node);
    }

    // Descendants only, in document order.
    private matchingElements(marker: FragmentMarker): Element[] {
        return this.$(this.node)
            .find(marker.tag)
            .toArray()
            .filter((element): element is Element => isTag(element) && matchesMarker(element, marker));
    }
}

/**
 * Parses a whole document and returns its root fragment.
 * @throws {MarkupParseError} when the markup is blank or contains no tag at all.
 */
export function parseMarkupDocument(markup: string): MarkupFragment {
    if (markup.trim().length === 0) {
        throw new MarkupParseError('Markup is empty');
    }
    if (!/<[a-z!]/i.test(markup)) {
        throw new MarkupParseError('Markup contains no tags');
    }
    let $: cheerio.CheerioAPI;
    try {
        $ = cheerio.load(markup);
    } catch (error) {
        throw new MarkupParseError('Markup could not be parsed', { cause: error });
    }
    return new CheerioMarkupFragment($, $.root()[0]);
}
