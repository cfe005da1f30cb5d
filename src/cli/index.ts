#!/usr/bin/env node
import { Command } from 'commander';
import chalk from 'chalk';
import { scanCommand } from './commands/scan.js';
import { reportCommand } from './commands/report.js';
import { runsCommand } from './commands/runs.js';
import { auditCommand } from './commands/audit.js';
import { trainCommand } from './commands/train.js';

const BANNER = `
${chalk.red('  ┏┓ ┏━┓╻ ╻┏┓╻╺┳╸╻ ╻┏━╸┏━┓╺┳╸┏━╸')}
${chalk.red('  ┣┻┓┃ ┃┃ ┃┃┗┫ ┃ ┗┳┛┃╺┓┣━┫ ┃ ┣╸ ')}
${chalk.red('  ┗━┛┗━┛┗━┛╹ ╹ ╹  ╹ ┗━┛╹ ╹ ╹ ┗━╸')}

${chalk.dim('  Policy-gated recon and triage for authorized bug bounty work.')}
`;

const program = new Command();

program
  .name('bountygate')
  .description('Policy-gated security testing pipeline with fused finding triage')
  .version('0.1.0')
  .hook('preAction', (_command, action) => {
    // Banner only for interactive run commands
    const args = process.argv.slice(2);
    if (action.name() === 'scan' && !args.includes('--json')) {
      console.log(BANNER);
    }
  });

// ─────────────────────────────────────────────────────────────
// scan - Run the pipeline against one or more targets
// ─────────────────────────────────────────────────────────────
program
  .command('scan <targets...>')
  .description('Validate scope, then run recon, scanning, triage and reporting')
  .option('-s, --scope-file <path>', 'Program scope file (JSON or YAML with in_scope/out_of_scope)')
  .option('-m, --mode <mode>', 'passive-only | safe-scan | full-scan-with-validation', 'safe-scan')
  .option('--allow-unblock', 'Offer a manual override for undecided scope (needs ALLOW_MANUAL_UNBLOCK=true)')
  .option('-t, --timeout <seconds>', 'Whole-run timeout per target')
  .option('-c, --config <path>', 'Config file (default: ./bountygate.config.yml)')
  .option('--json', 'Print run results as JSON only')
  .action(scanCommand);

// ─────────────────────────────────────────────────────────────
// report - Re-render a report from stored findings
// ─────────────────────────────────────────────────────────────
program
  .command('report <runId>')
  .description('Regenerate the markdown report of an earlier run')
  .option('-c, --config <path>', 'Config file')
  .action(reportCommand);

// ─────────────────────────────────────────────────────────────
// runs - List recorded runs
// ─────────────────────────────────────────────────────────────
program
  .command('runs')
  .description('List recorded runs, newest first')
  .option('-n, --limit <count>', 'Number of runs to show', '20')
  .option('-c, --config <path>', 'Config file')
  .action(runsCommand);

// ─────────────────────────────────────────────────────────────
// audit - Show policy decisions
// ─────────────────────────────────────────────────────────────
program
  .command('audit')
  .description('Show the policy decision audit trail')
  .option('--target <target>', 'Only decisions for this target')
  .option('-n, --limit <count>', 'Number of records to show', '50')
  .option('--json', 'Output as JSON')
  .option('-c, --config <path>', 'Config file')
  .action(auditCommand);

// ─────────────────────────────────────────────────────────────
// train - Fit the local triage classifier
// ─────────────────────────────────────────────────────────────
program
  .command('train')
  .description('Train the local triage classifier from labeled findings')
  .requiredOption('-d, --data <path>', 'Labeled examples (JSON array with label 0 or 1)')
  .option('-o, --output <path>', 'Model output path (default: config triage.modelPath)')
  .option('-c, --config <path>', 'Config file')
  .action(trainCommand);

program.parseAsync().catch((error: unknown) => {
  console.error(chalk.red('Error:'), error instanceof Error ? error.message : String(error));
  process.exit(1);
});
