import * as p from '@clack/prompts';
import chalk from 'chalk';
import { RunMode, ScopeDefinition } from '../../types.js';
import { loadScopeDefinition } from '../../core/config.js';
import { formatError } from '../../core/errors.js';
import { MultiTargetResult } from '../../core/pipeline.js';
import { Runtime, createRuntime, loadRuntimeConfig } from '../context.js';
import { renderRunCard } from '../components/card.js';
import { createTerminalOverrideChannel } from '../utils/override-prompt.js';

export interface ScanOptions {
  scopeFile?: string;
  mode: string;
  allowUnblock?: boolean;
  timeout?: string;
  config?: string;
  json?: boolean;
}

function parseTimeout(value: string | undefined, fallback: number | undefined): number | undefined {
  if (value === undefined) return fallback;
  const seconds = Number(value);
  if (!Number.isFinite(seconds) || seconds <= 0) {
    throw new Error(`Invalid --timeout value: ${value}`);
  }
  return seconds;
}

export async function scanCommand(targets: string[], options: ScanOptions): Promise<void> {
  const cwd = process.cwd();
  const quiet = options.json === true;

  if (!quiet) {
    p.intro(chalk.red('bountygate') + chalk.dim(` - ${options.mode}`));
  }

  // ─────────────────────────────────────────────────────────────
  // Configuration errors are fatal before any run starts
  // ─────────────────────────────────────────────────────────────
  let mode: RunMode;
  let scope: ScopeDefinition | undefined;
  let runtime: Runtime;
  let timeoutSeconds: number | undefined;

  try {
    const parsedMode = RunMode.safeParse(options.mode);
    if (!parsedMode.success) {
      throw new Error(`Unknown mode "${options.mode}" (expected ${RunMode.options.join(', ')})`);
    }
    mode = parsedMode.data;

    const config = loadRuntimeConfig(cwd, { configPath: options.config });
    scope = options.scopeFile ? loadScopeDefinition(options.scopeFile) : undefined;
    timeoutSeconds = parseTimeout(options.timeout, config.runTimeoutSeconds);
    runtime = createRuntime(cwd, config, {
      allowUnblock: options.allowUnblock,
      overrideChannel: createTerminalOverrideChannel(),
    });

    if (options.allowUnblock && !config.allowManualUnblock) {
      runtime.logger.warn('--allow-unblock ignored: set ALLOW_MANUAL_UNBLOCK=true to enable manual override');
    }
  } catch (error) {
    p.log.error(formatError(error));
    process.exit(1);
  }

  if (!scope) {
    runtime.logger.warn('No scope file given; targets will be treated as out of scope unless overridden');
  }

  // Ctrl+C cancels the current run; its permits and stage work unwind cleanly
  const controller = new AbortController();
  const onSigint = () => {
    p.log.warn('Cancelling...');
    controller.abort();
  };
  process.once('SIGINT', onSigint);

  const started = Date.now();
  let outcome: MultiTargetResult;
  try {
    outcome = await runtime.orchestrator.runTargets(targets, scope, {
      mode,
      signal: controller.signal,
      timeoutSeconds,
    });
  } finally {
    process.removeListener('SIGINT', onSigint);
  }

  if (quiet) {
    console.log(JSON.stringify(outcome, null, 2));
  } else {
    for (const result of outcome.results) {
      console.log();
      console.log(renderRunCard({ result, mode, duration: Date.now() - started }));
    }
    console.log();
    if (outcome.allSucceeded) {
      p.outro(chalk.green(`${outcome.results.length} target(s) completed`));
    } else {
      const failed = outcome.results.filter((r) => !r.success).length;
      p.outro(chalk.red(`${failed} of ${outcome.results.length} target(s) did not complete`));
    }
  }

  process.exit(outcome.allSucceeded ? 0 : 1);
}
