import * as p from '@clack/prompts';
import chalk from 'chalk';
import { resolve } from 'path';
import { formatError } from '../../core/errors.js';
import { loadLabeledExamples, trainClassifier } from '../../triage/classifier.js';
import { loadRuntimeConfig } from '../context.js';

export interface TrainOptions {
  data: string;
  output?: string;
  config?: string;
}

export async function trainCommand(options: TrainOptions): Promise<void> {
  const cwd = process.cwd();
  p.intro(chalk.red('bountygate') + chalk.dim(' - train triage model'));

  try {
    const config = loadRuntimeConfig(cwd, { configPath: options.config });
    const outputPath = resolve(cwd, options.output ?? config.triage.modelPath);
    const examples = loadLabeledExamples(resolve(cwd, options.data));

    const spinner = p.spinner();
    spinner.start(`Training on ${examples.length} labeled findings...`);
    const result = trainClassifier(examples);
    result.model.save(outputPath);
    spinner.stop('Model trained');

    p.log.info(`Train size: ${result.trainSize}, hold-out size: ${result.testSize}`);
    if (result.accuracy !== null) {
      p.log.info(`Hold-out accuracy: ${chalk.bold(result.accuracy.toFixed(2))}`);
    }
    p.outro(`Model saved to ${chalk.cyan(outputPath)}`);
  } catch (error) {
    p.log.error(formatError(error));
    process.exit(1);
  }
}
