import chalk from 'chalk';
import Table from 'cli-table3';
import type { ChangeRequest, CompletionReport, PropagationTask, RunReport, SyncOutcome, TaskStatus } from '../config/schema.js';
import { shortSha } from './logger.js';

const TABLE_CHARS = {
  top: '', 'top-mid': '', 'top-left': '', 'top-right': '',
  bottom: '', 'bottom-mid': '', 'bottom-left': '', 'bottom-right': '',
  left: '  ', 'left-mid': '', mid: '', 'mid-mid': '', right: '', 'right-mid': '',
  middle: chalk.dim(' │ '),
};

const STATUS_LABELS: Record<TaskStatus, string> = {
  pending: 'Pending',
  'branch-ready': 'Branch ready',
  replaying: 'Replaying',
  conflict: 'Conflict',
  replayed: 'Replayed',
  aborted: '⚡ Aborted',
  existing: '✓ Exists',
  published: '✓ Published',
  declined: '– Declined',
  planned: '○ Planned',
  failed: '✗ Failed',
};

export function statusLabel(status: TaskStatus): string {
  return STATUS_LABELS[status];
}

function colorStatus(status: TaskStatus): string {
  const label = statusLabel(status);
  switch (status) {
    case 'published':
    case 'existing':
      return chalk.green(label);
    case 'aborted':
    case 'declined':
      return chalk.yellow(label);
    case 'failed':
      return chalk.red(label);
    default:
      return chalk.dim(label);
  }
}

/** One line of detail for a finished task. */
export function taskDetails(task: PropagationTask): string {
  switch (task.status) {
    case 'published':
    case 'existing':
      return task.result ? `PR #${task.result.number} ${task.result.url}` : '';
    case 'aborted': {
      const last = task.conflicts[task.conflicts.length - 1];
      return last && last.files.length > 0 ? `conflict in ${last.files.join(', ')}` : 'conflict';
    }
    case 'declined':
      return task.push ? `pushed (${task.push.outcome}), no PR created` : 'no PR created';
    case 'planned':
      return 'dry run';
    default:
      return task.error?.message ?? '';
  }
}

export function syncDetails(outcome: SyncOutcome): string {
  const prefix = outcome.dryRun && outcome.action !== 'up-to-date' ? 'would be ' : '';
  switch (outcome.action) {
    case 'created':
      return `${prefix}created at ${shortSha(outcome.to)}`;
    case 'updated':
      return `${prefix}updated ${shortSha(outcome.from)} -> ${shortSha(outcome.to)}`;
    case 'up-to-date':
      return 'up-to-date';
  }
}

export function completionDetails(completion: CompletionReport, label: string): string {
  switch (completion.status) {
    case 'labeled':
      return `marked ${label}`;
    case 'already-labeled':
      return `already ${label}`;
    case 'would-label':
      return `would mark ${label}`;
    case 'no-targets':
      return 'no pr:<branch> labels, not marked';
    case 'incomplete':
      return `missing on ${completion.missing.join(', ')}`;
  }
}

/**
 * Renders the outcome of a run to the terminal.
 */
export class RunSummary {
  static render(report: RunReport, completedLabel: string): void {
    if (report.source) {
      console.log(chalk.bold(`\n  PR #${report.source.number}: ${report.source.title}\n`));
    }

    if (report.sync.length > 0) {
      const sync = new Table({ head: [chalk.dim('Fork branch'), chalk.dim('Sync')], chars: TABLE_CHARS });
      for (const outcome of report.sync) sync.push([chalk.white(outcome.branch), syncDetails(outcome)]);
      console.log(sync.toString() + '\n');
    }

    if (report.tasks.length > 0) {
      const table = new Table({
        head: [chalk.dim('Target'), chalk.dim('Branch'), chalk.dim('Status'), chalk.dim('Details')],
        chars: TABLE_CHARS,
      });
      for (const task of report.tasks) {
        table.push([chalk.white(task.target), task.localBranch, colorStatus(task.status), taskDetails(task)]);
      }
      console.log(table.toString() + '\n');
    }

    if (report.completion) {
      console.log(chalk.dim(`  Completion: ${completionDetails(report.completion, completedLabel)}\n`));
    }
  }

  static renderStatus(source: ChangeRequest, completion: CompletionReport, completedLabel: string): void {
    console.log(chalk.bold(`\n  PR #${source.number}: ${source.title}\n`));
    if (completion.declared.length > 0) {
      const table = new Table({ head: [chalk.dim('Target'), chalk.dim('PR')], chars: TABLE_CHARS });
      for (const target of completion.declared) {
        const done = !completion.missing.includes(target);
        table.push([chalk.white(target), done ? chalk.green('✓ exists') : chalk.red('✗ missing')]);
      }
      console.log(table.toString() + '\n');
    }
    console.log(chalk.dim(`  Completion: ${completionDetails(completion, completedLabel)}\n`));
  }
}
