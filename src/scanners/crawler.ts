/**
 * Crawler - breadth-first, same-host link discovery with conservative limits
 */

import { formatError, isAbortError } from '../core/errors.js';
import { Logger } from '../core/logger.js';
import { CrawlCollaborator } from '../core/pipeline.js';
import { sanitizeUrl, sleep } from '../core/utils.js';
import { Result, fail, ok } from '../core/validation.js';

const USER_AGENT = 'Mozilla/5.0 (Security Research Bot)';
const MAX_LINKS_PER_PAGE = 20;
const HREF_PATTERN = /href=["']([^"']+)["']/gi;

export interface CrawlerOptions {
  logger: Logger;
  maxDepth: number;
  maxPages: number;
  delaySeconds: number;
  timeoutSeconds: number;
  fetch?: typeof fetch;
}

/**
 * Absolute same-host links from an HTML page, at most 20.
 */
export function extractLinks(html: string, baseUrl: string): string[] {
  const baseHost = new URL(baseUrl).host;
  const links: string[] = [];

  for (const match of html.matchAll(HREF_PATTERN)) {
    const href = match[1];
    if (href.startsWith('#') || href.toLowerCase().startsWith('javascript:')) {
      continue;
    }

    let absolute: URL;
    try {
      absolute = new URL(href, baseUrl);
    } catch {
      continue;
    }
    if (absolute.host === baseHost) {
      links.push(absolute.toString());
    }
    if (links.length >= MAX_LINKS_PER_PAGE) break;
  }
  return links;
}

export class Crawler implements CrawlCollaborator {
  private readonly logger: Logger;
  private readonly fetchFn: typeof fetch;

  constructor(private readonly options: CrawlerOptions) {
    this.logger = options.logger.child({ component: 'crawler' });
    this.fetchFn = options.fetch ?? fetch;
  }

  async crawl(startUrl: string, signal?: AbortSignal): Promise<Result<string[]>> {
    const start = sanitizeUrl(startUrl);
    if (!start) {
      return fail(`Invalid start URL: ${startUrl}`);
    }

    const { maxDepth, maxPages, delaySeconds } = this.options;
    this.logger.info(`Crawling ${start} (max_depth=${maxDepth}, max_pages=${maxPages})`);

    const visited = new Set<string>();
    const discovered: string[] = [];
    const queue: Array<{ url: string; depth: number }> = [{ url: start, depth: 0 }];

    while (queue.length > 0 && discovered.length < maxPages) {
      const next = queue.shift();
      if (!next) break;
      const { url, depth } = next;
      if (visited.has(url) || depth > maxDepth) {
        continue;
      }

      visited.add(url);
      discovered.push(url);

      await sleep(delaySeconds * 1000, signal);

      try {
        const response = await this.fetchFn(url, {
          headers: { 'User-Agent': USER_AGENT },
          signal: this.requestSignal(signal),
        });
        if (response.status !== 200) {
          continue;
        }
        const html = await response.text();
        for (const link of extractLinks(html, url)) {
          if (!visited.has(link)) {
            queue.push({ url: link, depth: depth + 1 });
          }
        }
      } catch (error) {
        if (isAbortError(error) && signal?.aborted) {
          throw error;
        }
        this.logger.warn(`Failed to crawl ${url}: ${formatError(error)}`);
      }
    }

    this.logger.info(`Crawled ${discovered.length} pages`);
    return ok(discovered);
  }

  private requestSignal(signal?: AbortSignal): AbortSignal {
    const timeout = AbortSignal.timeout(this.options.timeoutSeconds * 1000);
    if (!signal) return timeout;

    const controller = new AbortController();
    const abort = () => controller.abort();
    signal.addEventListener('abort', abort, { once: true });
    timeout.addEventListener('abort', abort, { once: true });
    return controller.signal;
  }
}
