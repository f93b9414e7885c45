import { z } from 'zod';
import { ValidationError } from '../../utils/errors';
import type { CheckerOptions, KeywordSet } from '../../types';

export const CliOptionsSchema = z.object({
    keywords: z.string().optional(),
    lists: z.string().optional(),
    combinations: z.coerce.number().int('combinations must be an integer').default(2),
    tlds: z.string().default('com'),
    dash: z.boolean().default(false),
    workers: z.coerce.number()
        .int('workers must be an integer')
        .min(1, 'workers must be at least 1')
        .optional(),
    csv: z.string().min(1).optional(),
    whoisServer: z.string().min(1).optional(),
});

export type CliOptions = z.infer<typeof CliOptionsSchema>;

export class InputParser {

    static parseKeywords(input: string): KeywordSet {
        return input
            .split(',')
            .map((keyword) => keyword.trim())
            .filter((keyword) => keyword.length > 0);
    }

    static parseKeywordLists(input: string): KeywordSet[] {
        return input
            .split(';')
            .map((list) => this.parseKeywords(list))
            .filter((list) => list.length > 0);
    }

    static parseTlds(input: string): string[] {
        return this.parseKeywords(input)
            .map((tld) => tld.replace(/^\./, ''))
            .filter((tld) => tld.length > 0);
    }

    /**
     * Turn raw CLI flag values into the run configuration.
     * `defaultWorkers` applies when no --workers flag was given.
     */
    static toOptions(raw: unknown, defaultWorkers: number): CheckerOptions {
        const parsed = CliOptionsSchema.safeParse(raw);
        if (!parsed.success) {
            const issues = parsed.error.issues.map((issue) => issue.message).join('; ');
            throw new ValidationError(issues);
        }

        const flags = parsed.data;

        if (!flags.keywords && !flags.lists) {
            throw new ValidationError('Either --keywords or --lists must be provided');
        }
        if (flags.keywords && flags.lists) {
            throw new ValidationError('Cannot use both --keywords and --lists at the same time');
        }

        const keywordSets = flags.lists
            ? this.parseKeywordLists(flags.lists)
            : [this.parseKeywords(flags.keywords ?? '')].filter((set) => set.length > 0);

        if (keywordSets.length === 0) {
            throw new ValidationError('No keywords supplied');
        }

        const tlds = this.parseTlds(flags.tlds);
        if (tlds.length === 0) {
            throw new ValidationError('At least one TLD is required');
        }

        return {
            keywordSets,
            combinations: flags.combinations,
            tlds,
            separator: flags.dash ? '-' : '',
            workers: flags.workers ?? defaultWorkers,
            csvPath: flags.csv,
        };
    }
}
