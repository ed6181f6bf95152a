import type { ChangeRequestSummary, PropagationTask, PushReport, RepoRef } from '../config/schema.js';
import type { HostingApi } from '../github/client.js';
import type { WorkingCopy } from './git-operations.js';
import { propagatedBody, propagatedTitle } from './naming.js';
import { transition } from './task.js';
import { PublishError } from '../errors.js';
import type { Logger } from '../ui/logger.js';
import { shortSha } from '../ui/logger.js';

/** Asks the operator a yes/no question. */
export type Confirm = (message: string) => Promise<boolean>;

export interface PublisherOptions {
  fork: RepoRef;
  upstream: RepoRef;
  forkRemote: string;
  titleStripPrefix: string;
  confirmCreate: boolean;
}

/**
 * Pushes a replayed branch to the fork and opens the upstream pull request for it.
 * An open or merged request for the same head and base means the work was already
 * done on an earlier run: nothing is pushed and nothing is created.
 */
export class PullRequestPublisher {
  private hosting: HostingApi;
  private git: WorkingCopy;
  private logger: Logger;
  private confirm: Confirm;
  private options: PublisherOptions;

  constructor(hosting: HostingApi, git: WorkingCopy, logger: Logger, confirm: Confirm, options: PublisherOptions) {
    this.hosting = hosting;
    this.git = git;
    this.logger = logger;
    this.confirm = confirm;
    this.options = options;
  }

  /** Cross-repository head as GitHub expects it: `<forkOwner>:<branch>`. */
  headFor(localBranch: string): string {
    return `${this.options.fork.owner}:${localBranch}`;
  }

  async findExisting(localBranch: string, target: string): Promise<ChangeRequestSummary | null> {
    const head = this.headFor(localBranch);
    this.logger.debug(`Checking for an existing PR ${head} -> ${target}`);
    for (const state of ['open', 'merged'] as const) {
      const found = await this.hosting.findChangeRequests(this.options.upstream, { base: target, head, state });
      if (found.length > 0) return found[0];
    }
    return null;
  }

  async publish(task: PropagationTask): Promise<void> {
    const existing = await this.findExisting(task.localBranch, task.target);
    if (existing) {
      task.result = existing;
      transition(task, 'existing');
      this.logger.info(`PR already exists for ${task.localBranch} -> ${task.target}: ${existing.url}`);
      return;
    }

    this.logger.info(`Pushing ${task.localBranch} to ${this.options.forkRemote}`);
    try {
      task.push = await this.git.push(this.options.forkRemote, task.localBranch, { force: true });
    } catch (err) {
      throw new PublishError(`Failed to push ${task.localBranch}: ${err instanceof Error ? err.message : String(err)}`, { cause: err });
    }
    this.logger.success(describePush(task.push));

    if (this.options.confirmCreate && !(await this.confirm(`Create PR for branch ${task.localBranch}?`))) {
      transition(task, 'declined');
      this.logger.info(`Skipped PR creation for ${task.localBranch}`);
      return;
    }

    try {
      task.result = await this.hosting.createChangeRequest(this.options.upstream, {
        base: task.target,
        head: this.headFor(task.localBranch),
        title: propagatedTitle(task.source, task.target, this.options.titleStripPrefix),
        body: propagatedBody(task.source),
      });
    } catch (err) {
      throw new PublishError(`Failed to create PR for ${task.localBranch}: ${err instanceof Error ? err.message : String(err)}`, { cause: err });
    }
    transition(task, 'published');
    this.logger.success(`PR created: ${task.result.url}`);
  }
}

export function describePush(report: PushReport): string {
  switch (report.outcome) {
    case 'up-to-date':
      return `Branch ${report.remoteRef} is up-to-date`;
    case 'new-ref':
      return `Created ${report.remoteRef} at ${shortSha(report.to)}`;
    case 'fast-forward':
      return `Updated ${report.remoteRef} from ${shortSha(report.from)} to ${shortSha(report.to)}`;
    case 'forced-update':
      return `Updated [FORCED] ${report.remoteRef} from ${shortSha(report.from)} to ${shortSha(report.to)}`;
  }
}
