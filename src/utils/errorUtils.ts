// src/utils/errorUtils.ts

export interface ErrorMessageAndStack {
    message: string;
    stack?: string;
}

/**
 * Normalizes a caught value (Error, string, anything) into a message and an optional stack.
 */
export function getErrorMessageAndStack(error: unknown): ErrorMessageAndStack {
    if (error instanceof Error) {
        return { message: error.message || error.name, stack: error.stack };
    }
    if (typeof error === 'string') {
        return { message: error };
    }
    try {
        return { message: JSON.stringify(error) ?? String(error) };
    } catch {
        return { message: String(error) };
    }
}

/**
 * Raised when the environment does not satisfy the configuration schema.
 */
export class ConfigurationError extends Error {
    constructor(message: string, public readonly issues: string[] = []) {
        super(message);
        this.name = 'ConfigurationError';
    }
}

/**
 * The renderer could not carry the crawl forward. Ends the crawl in the `aborted` state.
 */
export class CrawlNavigationError extends Error {
    constructor(message: string, public readonly step: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'CrawlNavigationError';
    }
}
