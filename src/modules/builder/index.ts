import type { Candidate, Separator } from '../../types';

export class DomainNameBuilder {

    static build(candidate: Candidate, separator: Separator, tlds: string[]): string[] {
        const label = candidate.join(separator);
        return tlds.map((tld) => `${label}.${tld.replace(/^\./, '')}`);
    }

    static buildAll(candidates: Candidate[], separator: Separator, tlds: string[]): string[] {
        return candidates.flatMap((candidate) => this.build(candidate, separator, tlds));
    }
}
