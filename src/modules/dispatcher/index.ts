import pLimit from 'p-limit';
import { AvailabilityClassifier } from '../classifier';
import { logger, Logger } from '../observability';
import { ValidationError } from '../../utils/errors';
import type { LookupFn, LookupResult } from '../../types';

export type DispatchOptions = {
    concurrency: number;
    lookup: LookupFn;
    onResult?: (result: LookupResult) => void;
};

export class LookupDispatcher {

    /**
     * Runs one lookup per name with at most `concurrency` in flight and
     * resolves once every name has a result. Results arrive in completion
     * order; a failed lookup becomes that name's result and never stops the
     * rest of the batch.
     */
    static async dispatch(names: string[], options: DispatchOptions): Promise<LookupResult[]> {
        const { concurrency, lookup, onResult } = options;
        if (!Number.isInteger(concurrency) || concurrency < 1) {
            throw new ValidationError(`concurrency must be an integer >= 1 (got ${concurrency})`);
        }

        const limit = pLimit(concurrency);
        const results: LookupResult[] = [];

        const tasks = names.map((domain) => limit(async () => {
            const result = await this.check(domain, lookup);
            results.push(result);
            onResult?.(result);
        }));

        await Promise.all(tasks);
        return results;
    }

    static async check(domain: string, lookup: LookupFn): Promise<LookupResult> {
        const start = Date.now();
        try {
            const raw = await lookup(domain);
            return {
                domain,
                availability: AvailabilityClassifier.classify(raw),
                durationMs: Date.now() - start,
            };
        } catch (e) {
            const message = e instanceof Error ? e.message : String(e);
            const category = Logger.categorizeError(e);
            logger.debug(`Lookup failed for ${domain}: ${message}`, { domain, category });
            return {
                domain,
                failure: { message, category },
                durationMs: Date.now() - start,
            };
        }
    }
}
