import path from 'path';
import winston from 'winston';
import 'winston-daily-rotate-file';
import {
    CheckerError,
    LookupNetworkError,
    LookupProtocolError,
    LookupTimeoutError,
} from '../../utils/errors';
import { FailureCategory, isFailed, Availability } from '../../types';
import type { LogLevel, LookupResult } from '../../types';

export type LoggerOptions = {
    level?: LogLevel;
    dir?: string;
};

const NETWORK_HINTS = ['econnrefused', 'econnreset', 'enotfound', 'ehostunreach', 'eai_again', 'socket', 'network'];
const PROTOCOL_HINTS = ['parse', 'unexpected token', 'malformed', 'empty response', 'protocol'];

export class Logger {
    private logger: winston.Logger;

    constructor(options: LoggerOptions = {}) {
        this.logger = winston.createLogger({
            level: options.level ?? 'info',
            format: winston.format.combine(
                winston.format.timestamp(),
                winston.format.json()
            ),
        });
        this.attachTransports(options);
    }

    /**
     * Swap level and transports in place, so modules holding the shared
     * instance pick up settings loaded after import.
     */
    configure(options: LoggerOptions) {
        this.logger.clear();
        this.logger.level = options.level ?? 'info';
        this.attachTransports(options);
    }

    log(level: LogLevel, message: string, meta?: Record<string, unknown>) {
        if (meta) {
            this.logger.log(level, message, meta);
        } else {
            this.logger.log(level, message);
        }
    }

    debug(message: string, meta?: Record<string, unknown>) {
        this.log('debug', message, meta);
    }

    info(message: string, meta?: Record<string, unknown>) {
        this.log('info', message, meta);
    }

    warn(message: string, meta?: Record<string, unknown>) {
        this.log('warn', message, meta);
    }

    error(message: string, meta?: Record<string, unknown>) {
        this.log('error', message, meta);
    }

    static categorizeError(error: unknown): FailureCategory {
        if (error instanceof LookupTimeoutError) return FailureCategory.TIMEOUT;
        if (error instanceof LookupNetworkError) return FailureCategory.NETWORK;
        if (error instanceof LookupProtocolError) return FailureCategory.PROTOCOL;

        const msg = (error instanceof Error ? error.message : String(error)).toLowerCase();
        const code = error instanceof CheckerError ? error.code.toLowerCase() : '';

        if (msg.includes('timeout') || msg.includes('etimedout') || code.includes('timeout')) {
            return FailureCategory.TIMEOUT;
        }
        if (NETWORK_HINTS.some((hint) => msg.includes(hint))) {
            return FailureCategory.NETWORK;
        }
        if (PROTOCOL_HINTS.some((hint) => msg.includes(hint))) {
            return FailureCategory.PROTOCOL;
        }
        return FailureCategory.UNKNOWN;
    }

    private attachTransports(options: LoggerOptions) {
        // stdout carries the report; every log line goes to stderr
        this.logger.add(new winston.transports.Console({
            stderrLevels: ['error', 'warn', 'info', 'debug'],
            format: winston.format.simple(),
        }));

        if (options.dir) {
            this.logger.add(new winston.transports.DailyRotateFile({
                filename: path.join(options.dir, 'domain-check-%DATE%.log'),
                datePattern: 'YYYY-MM-DD',
                zippedArchive: true,
                maxSize: '20m',
                maxFiles: '14d',
            }));
        }
    }
}

export const logger = new Logger();

export type MetricsSummary = {
    total: number;
    available: number;
    taken: number;
    failed: number;
    total_latency: number;
    avg_latency: number;
    max_latency: number;
};

export class Metrics {
    stats = {
        total: 0,
        available: 0,
        taken: 0,
        failed: 0,
        total_latency: 0,
        max_latency: 0,
    };

    record(result: LookupResult) {
        this.stats.total++;
        if (isFailed(result)) {
            this.stats.failed++;
        } else if (result.availability === Availability.AVAILABLE) {
            this.stats.available++;
        } else {
            this.stats.taken++;
        }
        this.stats.total_latency += result.durationMs;
        this.stats.max_latency = Math.max(this.stats.max_latency, result.durationMs);
    }

    getSummary(): MetricsSummary {
        return {
            ...this.stats,
            avg_latency: this.stats.total > 0 ? Math.round(this.stats.total_latency / this.stats.total) : 0,
        };
    }
}
