// src/types/crawl.types.ts
import { RawPageCapture } from './journal.types';

export type WaitResult = 'found' | 'timeout';

/**
 * Browser-like capability the crawl drives. Every call is fallible I/O; a wait
 * that runs out of time resolves to `'timeout'` instead of rejecting.
 *
 * `TElement` is the renderer's own element handle type, opaque to the crawl.
 */
export interface PageRenderer<TElement> {
    navigate(url: string): Promise<void>;
    waitForElement(selector: string, timeoutMs: number): Promise<WaitResult>;
    click(element: TElement): Promise<void>;
    currentMarkup(): Promise<string>;
    findElement(selector: string): Promise<TElement | null>;
    /**
     * Attribute name → value. For form inputs, `checked` reflects the live
     * checked state rather than the initial attribute.
     */
    elementAttributes(element: TElement): Promise<Record<string, string>>;
    screenshot(): Promise<Buffer>;
}

export type CrawlState =
    | 'initializing'
    | 'filter_applied'
    | 'page_captured'
    | 'advancing'
    | 'done'
    | 'aborted';

export type CrawlTerminationReason =
    | 'next_control_absent'
    | 'next_control_disabled'
    | 'page_cap_reached'
    | 'navigation_failure';

export interface CrawlTransition {
    from: CrawlState;
    to: CrawlState;
    at: Date;
    sequenceNumber: number;
}

/**
 * How a capture source finished. `aborted` carries the navigation failure.
 */
export type CaptureOutcome =
    | { status: 'done'; reason: Exclude<CrawlTerminationReason, 'navigation_failure'> | 'archive_exhausted'; pagesCaptured: number; errors: string[] }
    | { status: 'aborted'; reason: 'navigation_failure'; pagesCaptured: number; step: string; message: string; diagnostics: string[]; errors: string[] };

/**
 * Anything that yields page captures in sequence order and reports how it ended.
 */
export interface CaptureSource {
    readonly description: string;
    captures(): AsyncGenerator<RawPageCapture, CaptureOutcome, void>;
}

export interface CrawlDiagnostics {
    reason: string;
    markup?: string;
    screenshot?: Buffer;
}

/**
 * Persists best-effort diagnostics of an aborted crawl; resolves to the
 * locations written.
 */
export interface CrawlDiagnosticsSink {
    saveDiagnostics(diagnostics: CrawlDiagnostics): Promise<string[]>;
}

/**
 * Receives every capture of a live crawl as it is taken.
 */
export interface CaptureArchive {
    archiveCapture(capture: RawPageCapture): Promise<string | null>;
}
