import type { ChangeRequest, Commit, RepoRef } from '../config/schema.js';
import type { HostingApi } from '../github/client.js';
import type { WorkingCopy } from './git-operations.js';
import { RepoValidationError } from '../errors.js';

/**
 * Commits a merged pull request brought in, oldest first.
 *
 * GitHub reports how many commits the request had; the same number is walked back
 * from the merge commit in the local clone. The merge commit only exists locally once
 * the upstream remote has been fetched.
 */
export class CommitExtractor {
  private hosting: HostingApi;
  private git: WorkingCopy;

  constructor(hosting: HostingApi, git: WorkingCopy) {
    this.hosting = hosting;
    this.git = git;
  }

  async extract(upstream: RepoRef, source: ChangeRequest, upstreamRemote = 'upstream'): Promise<Commit[]> {
    if (!source.merged || !source.mergeCommitSha) return [];

    const count = (await this.hosting.listChangeRequestCommits(upstream, source.number)).length;
    if (count === 0) return [];

    const mergeCommit = await this.git.revParse(source.mergeCommitSha);
    if (!mergeCommit) {
      throw new RepoValidationError(
        `Merge commit ${source.mergeCommitSha} of PR #${source.number} is not in the local repository. Fetch '${upstreamRemote}' first.`,
      );
    }

    const newestFirst = await this.git.log(mergeCommit, count);
    return [...newestFirst].reverse();
  }
}
