import type { Candidate, KeywordSet } from '../../types';

export class CombinationGenerator {

    /**
     * One keyword set: every `combinations`-sized subset, in source order.
     * Two or more sets: the cross product, one keyword per set.
     */
    static generate(keywordSets: KeywordSet[], combinations: number): Candidate[] {
        if (keywordSets.length === 0) return [];
        if (keywordSets.length === 1) return this.combinations(keywordSets[0], combinations);
        return this.crossProduct(keywordSets);
    }

    // Out-of-range sizes yield nothing rather than an error.
    static combinations(keywords: KeywordSet, size: number): Candidate[] {
        if (!Number.isInteger(size) || size <= 0 || size > keywords.length) {
            return [];
        }

        const result: Candidate[] = [];
        const current: string[] = [];

        const backtrack = (start: number) => {
            if (current.length === size) {
                result.push([...current]);
                return;
            }
            // stop early once too few keywords remain to fill the subset
            for (let i = start; i <= keywords.length - (size - current.length); i++) {
                current.push(keywords[i]);
                backtrack(i + 1);
                current.pop();
            }
        };

        backtrack(0);
        return result;
    }

    static crossProduct(lists: KeywordSet[]): Candidate[] {
        if (lists.length === 0) return [];

        return lists.reduce<Candidate[]>(
            (products, list) => products.flatMap((prefix) => list.map((keyword) => [...prefix, keyword])),
            [[]]
        );
    }
}
