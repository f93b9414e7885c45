import { createObjectCsvStringifier, createObjectCsvWriter } from 'csv-writer';
import { Availability, isFailed } from '../../types';
import type { LookupResult } from '../../types';

type ResultRow = {
    domain: string;
    status: 'available' | 'taken' | 'failed';
    error_category: string;
    error_message: string;
    duration_ms: number;
};

const HEADER = [
    { id: 'domain', title: 'domain' },
    { id: 'status', title: 'status' },
    { id: 'error_category', title: 'error_category' },
    { id: 'error_message', title: 'error_message' },
    { id: 'duration_ms', title: 'duration_ms' },
];

export class Exporter {

    static toRow(result: LookupResult): ResultRow {
        if (isFailed(result)) {
            return {
                domain: result.domain,
                status: 'failed',
                error_category: result.failure.category,
                error_message: result.failure.message,
                duration_ms: result.durationMs,
            };
        }
        return {
            domain: result.domain,
            status: result.availability === Availability.AVAILABLE ? 'available' : 'taken',
            error_category: '',
            error_message: '',
            duration_ms: result.durationMs,
        };
    }

    static toCsv(results: LookupResult[]): string {
        const stringifier = createObjectCsvStringifier({ header: HEADER });
        const header = stringifier.getHeaderString() ?? '';
        return header + stringifier.stringifyRecords(results.map((r) => this.toRow(r)));
    }

    static async exportCsv(path: string, results: LookupResult[]): Promise<void> {
        const writer = createObjectCsvWriter({ path, header: HEADER });
        await writer.writeRecords(results.map((r) => this.toRow(r)));
    }
}
