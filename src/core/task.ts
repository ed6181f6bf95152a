import type { ChangeRequest, PropagationTask, TaskStatus } from '../config/schema.js';
import { localBranchName } from './naming.js';

const TRANSITIONS: Record<TaskStatus, readonly TaskStatus[]> = {
  pending: ['branch-ready', 'existing', 'planned', 'failed'],
  'branch-ready': ['replaying', 'failed'],
  replaying: ['conflict', 'replayed', 'failed'],
  // resumed goes back to replaying
  conflict: ['replaying', 'aborted', 'failed'],
  replayed: ['existing', 'published', 'declined', 'failed'],
  aborted: [],
  existing: [],
  published: [],
  declined: [],
  planned: [],
  failed: [],
};

export const TERMINAL_STATUSES: readonly TaskStatus[] = ['aborted', 'existing', 'published', 'declined', 'planned', 'failed'];

export function createTask(source: ChangeRequest, target: string, branchPrefix: string): PropagationTask {
  return {
    source,
    target,
    localBranch: localBranchName(branchPrefix, source.number, target),
    status: 'pending',
    applied: [],
    conflicts: [],
  };
}

export function canTransition(from: TaskStatus, to: TaskStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

export function transition(task: PropagationTask, to: TaskStatus): void {
  if (!canTransition(task.status, to)) {
    throw new Error(`Illegal task transition for ${task.target}: ${task.status} → ${to}`);
  }
  task.status = to;
}

/** Record a failure from any non-terminal state. */
export function fail(task: PropagationTask, error: Error): void {
  if (TERMINAL_STATUSES.includes(task.status)) return;
  task.status = 'failed';
  task.error = error;
}

export function isSuccessful(task: PropagationTask): boolean {
  return task.status === 'published' || task.status === 'existing' || task.status === 'planned' || task.status === 'declined';
}
