import * as p from '@clack/prompts';
import chalk from 'chalk';
import { RunRecord } from '../../types.js';
import { formatError } from '../../core/errors.js';
import { createStorage, loadRuntimeConfig } from '../context.js';

export interface RunsOptions {
  config?: string;
  limit?: string;
}

function statusColor(status: RunRecord['status']): string {
  switch (status) {
    case 'Completed':
      return chalk.green(status);
    case 'Failed':
      return chalk.red(status);
    case 'Running':
      return chalk.yellow(status);
  }
}

export function formatRunLine(run: RunRecord): string {
  const reason = run.reason ? chalk.dim(` (${run.reason})`) : '';
  return `${run.runId}  ${run.target}  ${run.mode}  ${statusColor(run.status)}${reason}  ${run.findingsCount} finding(s)`;
}

export async function runsCommand(options: RunsOptions): Promise<void> {
  const cwd = process.cwd();

  try {
    const config = loadRuntimeConfig(cwd, { configPath: options.config });
    const runs = await createStorage(cwd, config).listRuns();
    const limit = options.limit ? Number(options.limit) : 20;

    if (runs.length === 0) {
      p.log.info('No runs recorded yet.');
      return;
    }

    console.log();
    console.log(chalk.red.bold('bountygate') + chalk.dim(' runs'));
    console.log();
    for (const run of runs.slice(0, limit)) {
      console.log(`  ${formatRunLine(run)}`);
    }
    console.log();
  } catch (error) {
    p.log.error(formatError(error));
    process.exit(1);
  }
}
