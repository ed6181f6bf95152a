import type { RepoRef, SyncOutcome } from '../config/schema.js';
import type { HostingApi } from '../github/client.js';
import { slug } from '../github/client.js';
import { SyncError } from '../errors.js';
import type { Logger } from '../ui/logger.js';
import { shortSha } from '../ui/logger.js';

/**
 * Mirrors upstream branches into the fork.
 * Fork branches are never developed independently, so a differing ref is moved
 * to upstream's commit with a forced update rather than merged.
 */
export class ForkSynchronizer {
  private hosting: HostingApi;
  private logger: Logger;

  constructor(hosting: HostingApi, logger: Logger) {
    this.hosting = hosting;
    this.logger = logger;
  }

  async sync(fork: RepoRef, upstream: RepoRef, branches: readonly string[], dryRun: boolean): Promise<SyncOutcome[]> {
    const outcomes: SyncOutcome[] = [];
    try {
      for (const branch of branches) {
        outcomes.push(await this.syncBranch(fork, upstream, branch, dryRun));
      }
    } catch (err) {
      if (err instanceof SyncError) throw err;
      throw new SyncError(`Fork sync failed: ${err instanceof Error ? err.message : String(err)}`, { cause: err });
    }
    return outcomes;
  }

  private async syncBranch(fork: RepoRef, upstream: RepoRef, branch: string, dryRun: boolean): Promise<SyncOutcome> {
    const source = await this.hosting.getBranch(upstream, branch);
    if (!source.found) {
      throw new SyncError(`Branch ${branch} not found in ${slug(upstream)}`);
    }
    const target = source.value.sha;
    const mirrored = await this.hosting.getBranch(fork, branch);

    if (!mirrored.found) {
      if (dryRun) {
        this.logger.dryRun(`create branch ${branch} in ${slug(fork)} at ${shortSha(target)}`);
      } else {
        await this.hosting.createBranchRef(fork, branch, target);
        this.logger.success(`Created ${branch} in ${slug(fork)} at ${shortSha(target)}`);
      }
      return { branch, action: 'created', from: null, to: target, dryRun };
    }

    const current = mirrored.value.sha;
    if (current === target) {
      this.logger.debug(`Branch ${branch} is up-to-date`);
      return { branch, action: 'up-to-date', from: current, to: target, dryRun };
    }

    if (dryRun) {
      this.logger.dryRun(`update branch ${branch}: ${shortSha(current)} -> ${shortSha(target)}`);
    } else {
      await this.hosting.updateBranchRef(fork, branch, target);
      this.logger.success(`Updated ${branch}: ${shortSha(current)} -> ${shortSha(target)}`);
    }
    return { branch, action: 'updated', from: current, to: target, dryRun };
  }
}
