import crypto from 'crypto';
import { CombinationGenerator } from '../modules/generator';
import { DomainNameBuilder } from '../modules/builder';
import { LookupDispatcher } from '../modules/dispatcher';
import { Reporter } from '../modules/reporter';
import { Exporter } from '../modules/exporter';
import { WhoisClient } from '../modules/whois';
import { getConfig } from '../config';
import type { WhoisConfig } from '../config';
import { logger, Metrics } from '../modules/observability';
import type { MetricsSummary } from '../modules/observability';
import type { CheckerOptions, LookupFn, LookupResult, Report } from '../types';

export type PipelineDeps = {
    lookup?: LookupFn;
    print?: (line: string) => void;
    progressEvery?: number;
};

export type PipelineOutcome = {
    runId: string;
    domains: string[];
    results: LookupResult[];
    report: Report | null;
    metrics: MetricsSummary;
};

export class Pipeline {

    static defaultLookup(whois: WhoisConfig = getConfig().whois): LookupFn {
        return new WhoisClient(whois).lookup;
    }

    static async run(options: CheckerOptions, deps: PipelineDeps = {}): Promise<PipelineOutcome> {
        const print = deps.print ?? ((line: string) => console.log(line));
        const progressEvery = deps.progressEvery ?? 25;
        const runId = `run-${crypto.randomUUID()}`;
        const metrics = new Metrics();

        const candidates = CombinationGenerator.generate(options.keywordSets, options.combinations);
        const domains = DomainNameBuilder.buildAll(candidates, options.separator, options.tlds);
        logger.debug(`Generated ${candidates.length} candidates, ${domains.length} domains`, { runId });

        if (domains.length === 0) {
            print('No domains to check');
            return { runId, domains, results: [], report: null, metrics: metrics.getSummary() };
        }

        const lookup = deps.lookup ?? this.defaultLookup();
        print(`Checking ${domains.length} domains...\n`);
        logger.info(`Lookup run started: ${runId}`, { domains: domains.length, workers: options.workers });

        let completed = 0;
        const collected = await LookupDispatcher.dispatch(domains, {
            concurrency: options.workers,
            lookup,
            onResult: (result) => {
                metrics.record(result);
                completed++;
                if (completed % progressEvery === 0) {
                    logger.info(`[${runId}] ${completed}/${domains.length}`);
                }
            },
        });

        const results = Reporter.orderBy(collected, domains);
        const report = Reporter.report(results);
        print(report.text);

        if (options.csvPath) {
            await Exporter.exportCsv(options.csvPath, results);
            logger.info(`Results written to ${options.csvPath}`);
        }

        const summary = metrics.getSummary();
        logger.info(`Lookup run completed: ${runId}`, summary);

        return { runId, domains, results, report, metrics: summary };
    }
}
