import type { PropagationTask, ReplayPlan } from '../config/schema.js';
import type { SequencerOperation, StepResult, WorkingCopy } from './git-operations.js';
import type { ConflictResolutionStrategy } from './conflict-resolver.js';
import { transition } from './task.js';
import { ReplayConflict } from '../errors.js';
import type { Logger } from '../ui/logger.js';
import { shortSha } from '../ui/logger.js';

export interface ExecutorOptions {
  forkRemote: string;
  signoff: boolean;
}

/**
 * Replays a source request onto one local branch.
 *
 * Drives a task through pending → branch-ready → replaying → replayed. A step that stops
 * on a conflict moves the task to `conflict` and waits on the resolution strategy for as
 * long as it takes; an abort ends this task only.
 */
export class CherryPickExecutor {
  private git: WorkingCopy;
  private resolver: ConflictResolutionStrategy;
  private logger: Logger;
  private options: ExecutorOptions;

  constructor(git: WorkingCopy, resolver: ConflictResolutionStrategy, logger: Logger, options: ExecutorOptions) {
    this.git = git;
    this.resolver = resolver;
    this.logger = logger;
    this.options = options;
  }

  /**
   * Check out `pr/<id>/<target>` at the fork's copy of the target. A branch left by an earlier
   * run is reset there so the replay always starts from the same base; the publisher force-pushes.
   */
  async prepare(task: PropagationTask): Promise<void> {
    const upstreamRef = `${this.options.forkRemote}/${task.target}`;
    if (await this.git.localBranchExists(task.localBranch)) {
      await this.git.checkout(task.localBranch);
      await this.git.resetHard(upstreamRef);
      this.logger.info(`Reset local branch ${task.localBranch} to ${upstreamRef}`);
    } else {
      await this.git.createTrackingBranch(task.localBranch, upstreamRef);
      await this.git.checkout(task.localBranch);
      this.logger.success(`Created local branch ${task.localBranch} from ${upstreamRef}`);
    }
    transition(task, 'branch-ready');
  }

  async replay(task: PropagationTask, plan: ReplayPlan): Promise<void> {
    transition(task, 'replaying');
    try {
      if (plan.kind === 'commits') {
        for (const commit of plan.commits) {
          this.logger.info(`Cherry-picking ${shortSha(commit.hash)} ${commit.subject}`);
          const result = await this.git.cherryPick(commit.hash, { signoff: this.options.signoff });
          if (await this.skipIfEmpty(commit.hash, task, result)) continue;
          if (!(await this.settleStep(task, 'cherry-pick', commit.hash, result))) return;
          task.applied.push(commit.hash);
        }
      } else if (await this.git.isPatchApplied(plan.path)) {
        this.logger.info(`Patch is already applied to ${task.localBranch}`);
      } else {
        this.logger.info(`Applying ${plan.path} with git am -3`);
        const result = await this.git.applyMailbox(plan.path);
        if (!(await this.settleStep(task, 'am', plan.path, result))) return;
        task.applied.push(plan.path);
      }
      transition(task, 'replayed');
    } catch (err) {
      const op = await this.git.operationInProgress();
      if (op) await this.git.abortOperation(op);
      throw err;
    }
  }

  /** A pick that stops with nothing conflicted and nothing staged is already on the branch. */
  private async skipIfEmpty(step: string, task: PropagationTask, result: StepResult): Promise<boolean> {
    if (result.ok || result.conflicts.length > 0) return false;
    if ((await this.git.operationInProgress()) !== 'cherry-pick' || (await this.git.hasStagedChanges())) return false;
    await this.git.skipOperation('cherry-pick');
    this.logger.info(`${shortSha(step)} is already on ${task.localBranch}, skipping`);
    return true;
  }

  /** Returns false when the operator aborted this branch. */
  private async settleStep(task: PropagationTask, op: SequencerOperation, step: string, result: StepResult): Promise<boolean> {
    if (result.ok) return true;

    transition(task, 'conflict');
    this.logger.warn(`Failed to apply ${shortSha(step)} to ${task.target}`);
    this.logger.debug(result.detail);

    let files = result.conflicts;
    for (let attempt = 1; ; attempt++) {
      const decision = await this.resolver.resolve({
        target: task.target,
        localBranch: task.localBranch,
        operation: op,
        step,
        files,
        attempt,
      });

      if (decision.kind === 'aborted') {
        if ((await this.git.operationInProgress()) === op) await this.git.abortOperation(op);
        task.conflicts.push({ step, files, outcome: 'aborted' });
        const conflict = new ReplayConflict(task.target, step, files);
        task.error = conflict;
        transition(task, 'aborted');
        this.logger.warn(`Aborted ${task.target}: ${conflict.message}`);
        return false;
      }

      const remaining = await this.git.conflictedFiles();
      if (remaining.length > 0) {
        this.logger.warn(`${remaining.length} file(s) still conflicted: ${remaining.join(', ')}`);
        files = remaining;
        continue;
      }

      task.conflicts.push({ step, files, outcome: 'resumed' });
      if (await this.finishStep(op)) {
        // next patch of the series stopped as well
        files = await this.git.conflictedFiles();
        continue;
      }
      transition(task, 'replaying');
      return true;
    }
  }

  /** Continue (or skip, when the resolution left nothing to commit). True if git stopped again. */
  private async finishStep(op: SequencerOperation): Promise<boolean> {
    if ((await this.git.operationInProgress()) !== op) return false;
    try {
      if (await this.git.hasStagedChanges()) {
        await this.git.continueOperation(op);
      } else {
        this.logger.info('Resolution is empty, skipping the step');
        await this.git.skipOperation(op);
      }
    } catch (err) {
      if ((await this.git.operationInProgress()) === op) return true;
      throw err;
    }
    return (await this.git.operationInProgress()) === op;
  }
}
