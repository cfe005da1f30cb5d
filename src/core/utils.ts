import { AbortError } from './errors.js';

// ─────────────────────────────────────────────────────────────
// Run IDs
// ─────────────────────────────────────────────────────────────

/**
 * Creates run IDs of the form `<ms timestamp>_<target token>`.
 * Timestamps are forced strictly increasing so IDs never repeat within a process.
 */
export function createRunIdFactory(now: () => number = Date.now): (target: string) => string {
  let last = 0;
  return (target: string) => {
    const ts = Math.max(now(), last + 1);
    last = ts;
    return `${ts}_${sanitizeTargetToken(target)}`;
  };
}

export const generateRunId = createRunIdFactory();

export function sanitizeTargetToken(target: string): string {
  const token = target.replace(/^[a-z]+:\/\//i, '').replace(/[^A-Za-z0-9-]+/g, '_').replace(/^_+|_+$/g, '');
  return (token || 'target').slice(0, 80);
}

// ─────────────────────────────────────────────────────────────
// Sanitizers
// ─────────────────────────────────────────────────────────────

const DOMAIN_PATTERN = /^(?:[a-zA-Z0-9](?:[a-zA-Z0-9-]{0,61}[a-zA-Z0-9])?\.)+[a-zA-Z]{2,}$/;
const IPV4_PATTERN = /^(?:(?:25[0-5]|2[0-4][0-9]|[01]?[0-9][0-9]?)\.){3}(?:25[0-5]|2[0-4][0-9]|[01]?[0-9][0-9]?)$/;

/**
 * Normalize a domain or IPv4 target. Returns null when it is neither.
 */
export function sanitizeDomain(input: string): string | null {
  let domain = input.trim();

  if (domain.includes('://')) {
    try {
      domain = new URL(domain).hostname;
    } catch {
      return null;
    }
  }

  domain = domain.split('/')[0].split(':')[0];

  if (DOMAIN_PATTERN.test(domain)) {
    return domain.toLowerCase();
  }
  if (IPV4_PATTERN.test(domain)) {
    return domain;
  }
  return null;
}

/**
 * Accept only absolute http(s) URLs.
 */
export function sanitizeUrl(input: string): string | null {
  let parsed: URL;
  try {
    parsed = new URL(input);
  } catch {
    return null;
  }
  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    return null;
  }
  return input;
}

// ─────────────────────────────────────────────────────────────
// Timing
// ─────────────────────────────────────────────────────────────

/**
 * Sleep that rejects with AbortError as soon as the signal fires.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) {
    return Promise.reject(new AbortError());
  }
  return new Promise((resolve, reject) => {
    const onAbort = () => {
      clearTimeout(timer);
      reject(new AbortError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

export function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new AbortError();
  }
}
