import * as fs from 'fs';
import * as net from 'net';
import * as os from 'os';
import * as path from 'path';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { Pipeline } from '../src/pipeline';
import { Exporter } from '../src/modules/exporter';
import { logger } from '../src/modules/observability';
import type { CheckerOptions } from '../src/types';
import { LookupNetworkError } from '../src/utils/errors';

// Answers every query with a "no match" response and records what it was sent.
const startWhoisServer = (queries: string[]): Promise<{ server: net.Server; port: number }> =>
    new Promise((resolve, reject) => {
        const server = net.createServer((socket) => {
            socket.on('data', (data) => {
                queries.push(data.toString());
                socket.end('No match for domain.\r\n');
            });
        });
        server.on('error', reject);
        server.listen(0, '127.0.0.1', () => {
            const address = server.address();
            if (address && typeof address === 'object') {
                resolve({ server, port: address.port });
            } else {
                reject(new Error('server has no port'));
            }
        });
    });

const closeWhoisServer = (server: net.Server): Promise<void> =>
    new Promise((resolve) => server.close(() => resolve()));

const baseOptions: CheckerOptions = {
    keywordSets: [['one', 'two', 'three']],
    combinations: 2,
    tlds: ['com'],
    separator: '',
    workers: 2,
};

describe('Pipeline', () => {
    let tmpDir: string | null = null;

    afterEach(() => {
        vi.restoreAllMocks();
        if (tmpDir) fs.rmSync(tmpDir, { recursive: true, force: true });
        tmpDir = null;
    });

    it('checks every generated domain and prints the report', async () => {
        const printed: string[] = [];
        const lookup = vi.fn(async (domain: string) => {
            if (domain === 'onetwo.com') return 'No match for "ONETWO.COM".';
            if (domain === 'twothree.com') throw new LookupNetworkError('connect ECONNREFUSED');
            return 'Domain Name: ONETHREE.COM';
        });

        const outcome = await Pipeline.run(baseOptions, { lookup, print: (line) => printed.push(line) });

        expect(outcome.domains).toEqual(['onetwo.com', 'onethree.com', 'twothree.com']);
        expect(outcome.results.map((r) => r.domain)).toEqual(outcome.domains);
        expect(outcome.report?.summary).toEqual({ available: 1, taken: 1, failed: 1, total: 3 });
        expect(outcome.metrics.total).toBe(3);
        expect(printed).toEqual([
            'Checking 3 domains...\n',
            [
                '✓ AVAILABLE (1):',
                '  onetwo.com',
                '',
                '✗ TAKEN (1):',
                '  onethree.com',
                '',
                '⚠ ERRORS (1):',
                '  twothree.com: connect ECONNREFUSED',
                '',
                'Summary: 1 available, 1 taken, 1 errors (total: 3)',
            ].join('\n'),
        ]);
    });

    it('stops early when no candidates can be generated', async () => {
        const printed: string[] = [];
        const lookup = vi.fn(async () => 'No match');

        const outcome = await Pipeline.run({ ...baseOptions, combinations: 5 }, { lookup, print: (line) => printed.push(line) });

        expect(printed).toEqual(['No domains to check']);
        expect(outcome.report).toBeNull();
        expect(lookup).not.toHaveBeenCalled();
    });

    it('crosses keyword lists with a dash and exports CSV', async () => {
        tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'domain-combo-'));
        const csvPath = path.join(tmpDir, 'out.csv');

        const outcome = await Pipeline.run(
            { ...baseOptions, keywordSets: [['a', 'b'], ['c']], separator: '-', tlds: ['com', 'net'], csvPath },
            { lookup: async () => 'Registrar: Test', print: () => undefined }
        );

        expect(outcome.domains).toEqual(['a-c.com', 'a-c.net', 'b-c.com', 'b-c.net']);
        expect(outcome.report?.summary.taken).toBe(4);
        expect(fs.readFileSync(csvPath, 'utf8')).toBe(Exporter.toCsv(outcome.results));
    });

    it('logs progress every N completed lookups', async () => {
        const info = vi.spyOn(logger, 'info').mockImplementation(() => undefined);

        const outcome = await Pipeline.run(baseOptions, {
            lookup: async () => 'No match',
            print: () => undefined,
            progressEvery: 1,
        });

        const progress = info.mock.calls
            .map(([message]) => message)
            .filter((message) => message.startsWith(`[${outcome.runId}]`));
        expect(progress).toEqual([
            `[${outcome.runId}] 1/3`,
            `[${outcome.runId}] 2/3`,
            `[${outcome.runId}] 3/3`,
        ]);
    });

    it('skips progress lines between every Nth lookup', async () => {
        const info = vi.spyOn(logger, 'info').mockImplementation(() => undefined);

        const outcome = await Pipeline.run(baseOptions, {
            lookup: async () => 'No match',
            print: () => undefined,
            progressEvery: 2,
        });

        const progress = info.mock.calls
            .map(([message]) => message)
            .filter((message) => message.startsWith(`[${outcome.runId}]`));
        expect(progress).toEqual([`[${outcome.runId}] 2/3`]);
    });

    it('builds the default lookup from a WHOIS config', async () => {
        const queries: string[] = [];
        const { server, port } = await startWhoisServer(queries);
        try {
            const lookup = Pipeline.defaultLookup({
                server: '127.0.0.1',
                port,
                timeoutMs: 2000,
                followReferrals: false,
            });

            expect(await lookup('ab.com')).toBe('No match for domain.\r\n');
            expect(queries).toEqual(['ab.com\r\n']);
        } finally {
            await closeWhoisServer(server);
        }
    });

    it('queries the WHOIS server from the environment when no lookup is given', async () => {
        const queries: string[] = [];
        const { server, port } = await startWhoisServer(queries);
        const overrides: Record<string, string> = {
            WHOIS_SERVER: '127.0.0.1',
            WHOIS_PORT: String(port),
            WHOIS_TIMEOUT_MS: '2000',
            WHOIS_FOLLOW_REFERRALS: 'false',
        };
        const saved = Object.keys(overrides).map((key) => [key, process.env[key]] as const);
        Object.assign(process.env, overrides);
        try {
            const outcome = await Pipeline.run(
                { ...baseOptions, keywordSets: [['a', 'b']] },
                { print: () => undefined }
            );

            expect(outcome.domains).toEqual(['ab.com']);
            expect(queries).toEqual(['ab.com\r\n']);
            expect(outcome.report?.summary).toEqual({ available: 1, taken: 0, failed: 0, total: 1 });
        } finally {
            for (const [key, value] of saved) {
                if (value === undefined) delete process.env[key];
                else process.env[key] = value;
            }
            await closeWhoisServer(server);
        }
    });
});
