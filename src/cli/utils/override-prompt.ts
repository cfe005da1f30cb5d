import * as p from '@clack/prompts';
import chalk from 'chalk';
import { OVERRIDE_TOKEN, OverrideChannel } from '../../policy/gate.js';

export interface TerminalOverrideOptions {
  /** Defaults to whether stdin is a TTY */
  interactive?: boolean;
}

/**
 * Operator prompt for the manual scope override. Without a terminal there is
 * nobody to ask, so the answer is always "no".
 */
export function createTerminalOverrideChannel(options: TerminalOverrideOptions = {}): OverrideChannel {
  const interactive = options.interactive ?? process.stdin.isTTY === true;

  return async (target, decision) => {
    if (!interactive) {
      p.log.warn('Manual override needs an interactive terminal; treating as declined.');
      return undefined;
    }

    p.log.warn(
      [
        chalk.yellow(`Scope for ${chalk.bold(target)} could not be confirmed.`),
        chalk.dim(`Reason: ${decision.reason}`),
        chalk.dim('Testing targets outside an authorized program scope may be illegal.'),
      ].join('\n')
    );

    const answer = await p.text({
      message: `Type ${chalk.bold(OVERRIDE_TOKEN)} to continue anyway`,
      placeholder: 'leave empty to abort',
    });

    if (p.isCancel(answer)) {
      return undefined;
    }
    return answer;
  };
}
