import type { ChangeRequest, CompletionReport, LabelSettings, RepoRef } from '../config/schema.js';
import type { HostingApi } from '../github/client.js';
import { resolveBranchPatterns } from './branch-patterns.js';
import { isPropagated, labelsToBranches, localBranchName } from './naming.js';
import type { Logger } from '../ui/logger.js';

export interface CompletionTrackerOptions {
  upstream: RepoRef;
  labels: LabelSettings;
  branchPrefix: string;
}

/** Something that can tell whether the request for `(localBranch, target)` was already opened or merged. */
export interface ExistenceCheck {
  findExisting(localBranch: string, target: string): Promise<unknown>;
}

/**
 * Marks a source request `pr-merged` once every branch its `pr:<branch>` labels name has a request.
 * Labels are re-read on every call, so running it again after more targets are published converges.
 */
export class CompletionTracker {
  private hosting: HostingApi;
  private publisher: ExistenceCheck;
  private logger: Logger;
  private options: CompletionTrackerOptions;

  constructor(hosting: HostingApi, publisher: ExistenceCheck, logger: Logger, options: CompletionTrackerOptions) {
    this.hosting = hosting;
    this.publisher = publisher;
    this.logger = logger;
    this.options = options;
  }

  async check(source: ChangeRequest, options: { apply: boolean; dryRun: boolean }): Promise<CompletionReport> {
    const labels = await this.hosting.getLabels(this.options.upstream, source.number);
    if (isPropagated(labels, this.options.labels)) {
      return { declared: [], missing: [], status: 'already-labeled' };
    }

    const declared = await this.declaredTargets(labels, source.baseBranch);
    if (declared.length === 0) {
      this.logger.warn(`PR #${source.number} declares no ${this.options.labels.target_prefix}<branch> labels; not marking it ${this.options.labels.completed}`);
      return { declared, missing: [], status: 'no-targets' };
    }

    const missing: string[] = [];
    for (const target of declared) {
      const local = localBranchName(this.options.branchPrefix, source.number, target);
      if ((await this.publisher.findExisting(local, target)) === null) missing.push(target);
    }

    if (missing.length > 0) {
      this.logger.info(`PR #${source.number} is still missing on: ${missing.join(', ')}`);
      return { declared, missing, status: 'incomplete' };
    }
    if (options.dryRun || !options.apply) {
      if (options.dryRun) this.logger.dryRun(`add label ${this.options.labels.completed} to PR #${source.number}`);
      return { declared, missing, status: 'would-label' };
    }

    await this.hosting.setLabels(this.options.upstream, source.number, [...labels, this.options.labels.completed]);
    this.logger.success(`Marked PR #${source.number} as ${this.options.labels.completed}`);
    return { declared, missing, status: 'labeled' };
  }

  /** `pr:` labels expanded against upstream (patterns allowed), minus the request's own base branch. */
  private async declaredTargets(labels: readonly string[], baseBranch: string): Promise<string[]> {
    const patterns = labelsToBranches(labels, this.options.labels);
    if (patterns.length === 0) return [];
    const upstreamBranches = (await this.hosting.listBranches(this.options.upstream)).map((b) => b.name);
    const resolved = resolveBranchPatterns(patterns, upstreamBranches);
    resolved.delete(baseBranch);
    return [...resolved];
  }
}
