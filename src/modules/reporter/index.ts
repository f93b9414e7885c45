import { Availability, isFailed } from '../../types';
import type { LookupFailed, LookupResult, Report } from '../../types';

export type Buckets = {
    available: string[];
    taken: string[];
    failed: LookupFailed[];
};

export class Reporter {

    static partition(results: LookupResult[]): Buckets {
        const buckets: Buckets = { available: [], taken: [], failed: [] };

        for (const result of results) {
            if (isFailed(result)) {
                buckets.failed.push(result);
            } else if (result.availability === Availability.AVAILABLE) {
                buckets.available.push(result.domain);
            } else {
                buckets.taken.push(result.domain);
            }
        }

        return buckets;
    }

    /**
     * Restore input order for results collected in completion order.
     * Names missing from `names` sort last; ties keep their relative order.
     */
    static orderBy(results: LookupResult[], names: string[]): LookupResult[] {
        const position = new Map<string, number>();
        names.forEach((name, index) => {
            if (!position.has(name)) position.set(name, index);
        });

        const rank = (domain: string) => position.get(domain) ?? Number.MAX_SAFE_INTEGER;
        return [...results].sort((a, b) => rank(a.domain) - rank(b.domain));
    }

    static report(results: LookupResult[]): Report {
        const { available, taken, failed } = this.partition(results);
        const lines: string[] = [];

        if (available.length > 0) {
            lines.push(`✓ AVAILABLE (${available.length}):`);
            available.forEach((domain) => lines.push(`  ${domain}`));
            lines.push('');
        }

        if (taken.length > 0) {
            lines.push(`✗ TAKEN (${taken.length}):`);
            taken.forEach((domain) => lines.push(`  ${domain}`));
            lines.push('');
        }

        if (failed.length > 0) {
            lines.push(`⚠ ERRORS (${failed.length}):`);
            failed.forEach((result) => lines.push(`  ${result.domain}: ${result.failure.message}`));
            lines.push('');
        }

        const summary = {
            available: available.length,
            taken: taken.length,
            failed: failed.length,
            total: results.length,
        };

        lines.push(
            `Summary: ${summary.available} available, ${summary.taken} taken, ${summary.failed} errors (total: ${summary.total})`
        );

        return { text: lines.join('\n'), summary };
    }
}
