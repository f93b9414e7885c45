/**
 * 🚨 ERROR CLASSES
 * Every error raised by the checker carries a stable `code` so callers can
 * branch on it without matching messages.
 */

export class CheckerError extends Error {
    constructor(message: string, public code: string, public context?: Record<string, unknown>) {
        super(message);
        this.name = this.constructor.name;
        Error.captureStackTrace(this, this.constructor);
    }
}

export class ValidationError extends CheckerError {
    constructor(message: string) {
        super(message, 'VALIDATION_ERROR', { fatal: false });
    }
}

export class ConfigurationError extends CheckerError {
    constructor(message: string) {
        super(message, 'CONFIG_ERROR', { fatal: true });
    }
}

export class LookupNetworkError extends CheckerError {
    constructor(message: string, context?: Record<string, unknown>) {
        super(message, 'NETWORK_ERROR', context);
    }
}

export class LookupTimeoutError extends CheckerError {
    constructor(message: string, context?: Record<string, unknown>) {
        super(message, 'TIMEOUT_ERROR', context);
    }
}

export class LookupProtocolError extends CheckerError {
    constructor(message: string, context?: Record<string, unknown>) {
        super(message, 'PROTOCOL_ERROR', context);
    }
}
