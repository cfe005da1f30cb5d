/**
 * Passive Recon - subdomain enumeration (subfinder) and HTTP probing (httpx)
 *
 * Missing tools or tool failures degrade the result instead of failing it:
 * enumeration always returns at least the target itself.
 */

import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { CommandRunner, runCommand } from '../core/command.js';
import { Logger } from '../core/logger.js';
import { ReconCollaborator } from '../core/pipeline.js';
import { sanitizeDomain } from '../core/utils.js';
import { Result, fail, ok } from '../core/validation.js';

const SUBFINDER_TIMEOUT = 60_000;
const HTTPX_TIMEOUT = 120_000;

export interface PassiveReconOptions {
  logger: Logger;
  httpxThreads: number;
  timeoutSeconds: number;
  run?: CommandRunner;
}

function outputLines(stdout: string): string[] {
  return stdout.split('\n').map((line) => line.trim()).filter(Boolean);
}

export class PassiveRecon implements ReconCollaborator {
  private readonly logger: Logger;
  private readonly run: CommandRunner;

  constructor(private readonly options: PassiveReconOptions) {
    this.logger = options.logger.child({ component: 'recon' });
    this.run = options.run ?? runCommand;
  }

  async enumerate(target: string, signal?: AbortSignal): Promise<Result<string[]>> {
    const domain = sanitizeDomain(target);
    if (!domain) {
      return fail(`Invalid target domain: ${target}`);
    }

    this.logger.info(`Enumerating subdomains for ${domain}`);
    const subdomains = new Set<string>();

    const result = await this.run('subfinder', ['-d', domain, '-silent', '-all'], {
      timeout: SUBFINDER_TIMEOUT,
      signal,
    });
    if (result.notFound) {
      this.logger.warn('subfinder not found, skipping');
    } else if (result.timedOut) {
      this.logger.warn('subfinder timed out');
    } else if (result.failed) {
      this.logger.warn(`subfinder failed: ${result.stderr.slice(0, 200)}`);
    } else {
      const found = outputLines(result.stdout);
      found.forEach((host) => subdomains.add(host.toLowerCase()));
      this.logger.info(`Subfinder found ${found.length} subdomains`);
    }

    subdomains.add(domain);
    return ok([...subdomains].sort());
  }

  async probe(hosts: string[], signal?: AbortSignal): Promise<Result<string[]>> {
    if (hosts.length === 0) {
      return ok([]);
    }

    this.logger.info(`Probing ${hosts.length} subdomains for HTTP services`);
    const dir = mkdtempSync(join(tmpdir(), 'bountygate-httpx-'));
    const listFile = join(dir, 'hosts.txt');

    try {
      writeFileSync(listFile, hosts.join('\n'), 'utf-8');
      const result = await this.run(
        'httpx',
        [
          '-l', listFile,
          '-silent',
          '-threads', String(this.options.httpxThreads),
          '-timeout', String(this.options.timeoutSeconds),
          '-no-color',
          '-status-code',
          '-title',
        ],
        { timeout: HTTPX_TIMEOUT, signal }
      );

      if (result.notFound) {
        return fail('httpx not found, skipping HTTP probing');
      }
      if (result.timedOut) {
        return fail('httpx timed out');
      }
      if (result.failed) {
        return fail(`httpx failed: ${result.stderr.slice(0, 200)}`);
      }

      // Lines look like: https://host [200] [Title]
      const live = outputLines(result.stdout).map((line) => line.split(/\s+/)[0]);
      this.logger.info(`Found ${live.length} live HTTP services`);
      return ok(live);
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  }
}
