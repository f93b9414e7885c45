/**
 * WHOIS over TCP (RFC 3912): send the name followed by CRLF and read until
 * the server closes the connection.
 *
 * The default server is IANA's, which answers with a `refer:` line naming
 * the registry server for the TLD. One referral hop is followed when enabled.
 */

import * as net from 'net';
import { logger } from '../observability';
import { LookupNetworkError, LookupProtocolError, LookupTimeoutError } from '../../utils/errors';
import type { WhoisConfig } from '../../config';

const REFERRAL_PATTERN = /^\s*(?:refer|whois):\s*(\S+)\s*$/im;

export class WhoisClient {
    constructor(private readonly options: WhoisConfig) {}

    lookup = async (domain: string): Promise<string> => {
        const response = await this.query(this.options.server, domain);
        if (!this.options.followReferrals) return response;

        const referral = WhoisClient.findReferral(response);
        if (!referral || referral.toLowerCase() === this.options.server.toLowerCase()) {
            return response;
        }

        logger.debug(`Following referral for ${domain}: ${this.options.server} -> ${referral}`);
        return this.query(referral, domain);
    };

    static findReferral(response: string): string | null {
        const match = response.match(REFERRAL_PATTERN);
        return match ? match[1] : null;
    }

    query(server: string, domain: string): Promise<string> {
        const { port, timeoutMs } = this.options;

        return new Promise((resolve, reject) => {
            const chunks: Buffer[] = [];
            let settled = false;

            const socket = net.createConnection(port, server);
            socket.setTimeout(timeoutMs);

            const fail = (error: Error) => {
                if (settled) return;
                settled = true;
                socket.destroy();
                reject(error);
            };

            socket.on('connect', () => {
                socket.write(`${domain}\r\n`);
            });

            socket.on('data', (data: Buffer) => {
                chunks.push(data);
            });

            socket.on('timeout', () => {
                fail(new LookupTimeoutError(`${server} timed out after ${timeoutMs}ms`, { server, domain }));
            });

            socket.on('error', (e) => {
                fail(new LookupNetworkError(`${server}: ${e.message}`, { server, domain }));
            });

            socket.on('close', () => {
                if (settled) return;
                settled = true;

                const text = Buffer.concat(chunks).toString('utf8');
                if (text.trim().length === 0) {
                    reject(new LookupProtocolError(`Empty response from ${server}`, { server, domain }));
                    return;
                }
                resolve(text);
            });
        });
    }
}
