/**
 * ASCII card renderer for run results
 * Creates a screenshot-friendly summary card
 */

import chalk from 'chalk';
import { PipelineResult } from '../../core/pipeline.js';

export interface RunCardData {
  result: PipelineResult;
  mode: string;
  duration: number; // ms
}

const BOX = {
  topLeft: '┌',
  topRight: '┐',
  bottomLeft: '└',
  bottomRight: '┘',
  horizontal: '─',
  vertical: '│',
  teeRight: '├',
  teeLeft: '┤',
};

function line(char: string, width: number): string {
  return char.repeat(width);
}

export function stripAnsi(str: string): string {
  // eslint-disable-next-line no-control-regex
  return str.replace(/\u001b\[\d+(;\d+)*m/g, '');
}

function padRight(str: string, width: number): string {
  const padding = Math.max(0, width - stripAnsi(str).length);
  return str + ' '.repeat(padding);
}

function row(content: string, width: number): string {
  return BOX.vertical + '  ' + padRight(content, width - 4) + '  ' + BOX.vertical;
}

function divider(width: number): string {
  return BOX.teeRight + line(BOX.horizontal, width) + BOX.teeLeft;
}

function topBorder(width: number): string {
  return BOX.topLeft + line(BOX.horizontal, width) + BOX.topRight;
}

function bottomBorder(width: number): string {
  return BOX.bottomLeft + line(BOX.horizontal, width) + BOX.bottomRight;
}

export function formatDuration(ms: number): string {
  const totalSeconds = Math.floor(ms / 1000);
  const minutes = Math.floor(totalSeconds / 60);
  const seconds = totalSeconds % 60;
  return minutes > 0 ? `${minutes}m ${seconds}s` : `${seconds}s`;
}

function title(result: PipelineResult): string {
  switch (result.status) {
    case 'completed':
      return chalk.bold.green('RUN COMPLETE');
    case 'policy-stop':
      return chalk.bold.yellow('STOPPED BY POLICY');
    case 'failed':
      return chalk.bold.red('RUN FAILED');
  }
}

/**
 * Render a run summary card
 *
 * ┌─────────────────────────────────────────────────────────────┐
 * │  RUN COMPLETE                                               │
 * ├─────────────────────────────────────────────────────────────┤
 * │  Target        api.example.com                              │
 * │  Run ID        1718000000000_api_example_com                │
 * │  Mode          safe-scan                                    │
 * │  Duration      2m 5s                                        │
 * ├─────────────────────────────────────────────────────────────┤
 * │  Findings      4                                            │
 * │  Report: ./outputs/<run>/report.md                          │
 * └─────────────────────────────────────────────────────────────┘
 */
export function renderRunCard(data: RunCardData): string {
  const width = 61; // Inner width (excluding border chars)
  const { result } = data;
  const lines: string[] = [];

  lines.push(topBorder(width));
  lines.push(row(title(result), width));
  lines.push(divider(width));

  lines.push(row(`${chalk.dim('Target')}        ${result.target}`, width));
  if (result.runId) {
    lines.push(row(`${chalk.dim('Run ID')}        ${result.runId}`, width));
  }
  lines.push(row(`${chalk.dim('Mode')}          ${data.mode}`, width));
  lines.push(row(`${chalk.dim('Duration')}      ${formatDuration(data.duration)}`, width));
  lines.push(divider(width));

  switch (result.status) {
    case 'completed':
      lines.push(row(`${chalk.bold('Findings')}      ${result.findingsCount}`, width));
      if (result.reportPath) {
        lines.push(row(`${chalk.dim('Report:')} ${chalk.cyan(result.reportPath)}`, width));
      }
      break;
    case 'policy-stop':
      lines.push(row(`${chalk.bold('Reason')}        ${result.reason}`, width));
      lines.push(row(chalk.dim(result.detail.slice(0, width - 4)), width));
      break;
    case 'failed':
      lines.push(row(`${chalk.bold('Reason')}        ${result.reason}`, width));
      lines.push(row(chalk.dim(result.error.slice(0, width - 4)), width));
      break;
  }
  lines.push(bottomBorder(width));

  return lines.join('\n');
}
