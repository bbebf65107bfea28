/**
 * Raised when configuration is missing or invalid. Carries every problem found, not just the first.
 */
export class ConfigError extends Error {
    readonly details: string[];

    constructor(message: string, details: string[] = []) {
        super(details.length > 0 ? `${message}: ${details.join('; ')}` : message);
        this.name = 'ConfigError';
        this.details = details;
    }
}

/**
 * Raised when a startup precondition fails (for example the speech model cannot be found).
 */
export class StartupError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'StartupError';
    }
}
