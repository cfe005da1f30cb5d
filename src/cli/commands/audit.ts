import * as p from '@clack/prompts';
import chalk from 'chalk';
import { AuditRecord } from '../../types.js';
import { formatError } from '../../core/errors.js';
import { createStorage, loadRuntimeConfig } from '../context.js';

export interface AuditOptions {
  config?: string;
  target?: string;
  limit?: string;
  json?: boolean;
}

const DECISION_COLORS: Record<AuditRecord['decision'], (s: string) => string> = {
  Allowed: chalk.green,
  Blocked: chalk.red,
  Unknown: chalk.yellow,
  RequiresValidation: chalk.blue,
};

export function formatAuditLine(record: AuditRecord): string {
  const decision = DECISION_COLORS[record.decision](record.decision.padEnd(18));
  return `${chalk.dim(record.timestamp)}  ${decision} ${record.action_kind.padEnd(24)} ${record.target}  ${chalk.dim(record.reason)}`;
}

export async function auditCommand(options: AuditOptions): Promise<void> {
  const cwd = process.cwd();

  try {
    const config = loadRuntimeConfig(cwd, { configPath: options.config });
    const records = await createStorage(cwd, config).listPolicyDecisions({
      target: options.target,
      limit: options.limit ? Number(options.limit) : 50,
    });

    if (options.json) {
      console.log(JSON.stringify(records, null, 2));
      return;
    }
    if (records.length === 0) {
      p.log.info('No policy decisions recorded.');
      return;
    }
    for (const record of records) {
      console.log(formatAuditLine(record));
    }
  } catch (error) {
    p.log.error(formatError(error));
    process.exit(1);
  }
}
