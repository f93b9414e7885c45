export type KeywordSet = string[];

// One keyword per slot, in output order. Never mutated after generation.
export type Candidate = readonly string[];

export enum Availability {
    AVAILABLE = 'AVAILABLE',
    TAKEN = 'TAKEN',
}

export enum FailureCategory {
    NETWORK = 'NETWORK',
    TIMEOUT = 'TIMEOUT',
    PROTOCOL = 'PROTOCOL',
    UNKNOWN = 'UNKNOWN',
}

export type LookupFailure = {
    message: string;
    category: FailureCategory;
};

export type LookupSuccess = {
    domain: string;
    availability: Availability;
    durationMs: number;
};

export type LookupFailed = {
    domain: string;
    failure: LookupFailure;
    durationMs: number;
};

export type LookupResult = LookupSuccess | LookupFailed;

/**
 * The lookup collaborator: resolves with the raw directory response for a
 * domain, or rejects when the query could not be completed.
 */
export type LookupFn = (domain: string) => Promise<string>;

export type Separator = '' | '-';

export type CheckerOptions = {
    keywordSets: KeywordSet[];
    combinations: number;
    tlds: string[];
    separator: Separator;
    workers: number;
    csvPath?: string;
};

export type ReportSummary = {
    available: number;
    taken: number;
    failed: number;
    total: number;
};

export type Report = {
    text: string;
    summary: ReportSummary;
};

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export const isFailed = (result: LookupResult): result is LookupFailed => 'failure' in result;
