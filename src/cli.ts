#!/usr/bin/env node
import { Command } from 'commander';
import { getConfig } from './config';
import { InputParser } from './modules/parser';
import { WhoisClient } from './modules/whois';
import { logger } from './modules/observability';
import { Pipeline } from './pipeline';
import { CheckerError, ValidationError } from './utils/errors';

const EXAMPLES = `
Examples:
  # Check 2-word combinations from a single list
  $ domain-combo --keywords=super,fast,cloud

  # Check combinations between two lists
  $ domain-combo --lists="super,fast;cloud,service"

  # Use dash separator and check multiple TLDs
  $ domain-combo --keywords=my,app --dash --tlds=com,net,org

  # Check 3-word combinations
  $ domain-combo --keywords=get,my,app,now --combinations=3
`;

const program = new Command();

program
    .name('domain-combo')
    .description('Generate domain names from keyword combinations and check their availability')
    .version('1.0.0')
    .option('-k, --keywords <list>', "Comma-separated keywords (e.g. 'one,two,three')")
    .option('-l, --lists <lists>', "Semicolon-separated lists of keywords (e.g. 'one,two;three,four')")
    .option('-c, --combinations <n>', 'Number of keywords to combine (ignored if --lists provided)', '2')
    .option('-t, --tlds <list>', "Comma-separated TLDs to check (e.g. 'com,net,org')", 'com')
    .option('-d, --dash', "Use dash separator (e.g. 'one-two' instead of 'onetwo')", false)
    .option('-w, --workers <n>', 'Number of concurrent workers (default: WORKERS or 10)')
    .option('--csv <path>', 'Also write results to a CSV file')
    .option('--whois-server <host>', 'WHOIS server to query first (default: WHOIS_SERVER or whois.iana.org)')
    .addHelpText('after', EXAMPLES)
    .action(async () => {
        try {
            const config = getConfig();
            logger.configure(config.logging);

            const flags = program.opts();
            const options = InputParser.toOptions(flags, config.workers);
            const server = typeof flags.whoisServer === 'string' ? flags.whoisServer : config.whois.server;
            const client = new WhoisClient({ ...config.whois, server });

            await Pipeline.run(options, {
                lookup: client.lookup,
                progressEvery: config.progressEvery,
            });
        } catch (e) {
            if (e instanceof ValidationError) {
                console.error(`Error: ${e.message}\n`);
                program.outputHelp({ error: true });
                process.exit(1);
            }
            if (e instanceof CheckerError) {
                console.error(`Fatal Error [${e.code}]: ${e.message}`);
                process.exit(1);
            }
            throw e;
        }
    });

program.parseAsync(process.argv).catch((err: unknown) => {
    console.error('Fatal Error:', err instanceof Error ? err.message : err);
    process.exit(1);
});
