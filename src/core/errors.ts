export class BountyGateError extends Error {
  constructor(message: string, public readonly cause?: unknown) {
    super(message);
    this.name = 'BountyGateError';
  }
}

/**
 * Bad config, scope or manifest file. Fatal before any external side effect.
 */
export class ConfigError extends BountyGateError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = 'ConfigError';
  }
}

export class AdvisoryError extends BountyGateError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = 'AdvisoryError';
  }
}

export class AbortError extends BountyGateError {
  constructor(message = 'Operation aborted') {
    super(message);
    this.name = 'AbortError';
  }
}

export function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === 'AbortError';
}

export function formatError(error: unknown): string {
  if (error instanceof Error) {
    return error.message || error.name;
  }
  return String(error);
}
