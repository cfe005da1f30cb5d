import * as p from '@clack/prompts';
import chalk from 'chalk';
import { formatError } from '../../core/errors.js';
import { createRuntime, loadRuntimeConfig } from '../context.js';

export interface ReportOptions {
  config?: string;
}

export async function reportCommand(runId: string, options: ReportOptions): Promise<void> {
  const cwd = process.cwd();
  p.intro(chalk.red('bountygate') + chalk.dim(' - report'));

  try {
    const runtime = createRuntime(cwd, loadRuntimeConfig(cwd, { configPath: options.config }));

    const spinner = p.spinner();
    spinner.start(`Rendering report for ${runId}...`);
    const result = await runtime.orchestrator.generateReportOnly(runId);

    if (!result.success) {
      spinner.stop(chalk.red('Report failed'));
      p.log.error(result.error);
      process.exit(1);
    }

    spinner.stop('Report written');
    p.outro(chalk.cyan(result.data));
  } catch (error) {
    p.log.error(formatError(error));
    process.exit(1);
  }
}
