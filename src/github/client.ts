import { Octokit, RequestError } from 'octokit';
import type {
  BranchHead,
  ChangeRequest,
  ChangeRequestState,
  ChangeRequestSummary,
  RepoRef,
  RepositoryInfo,
} from '../config/schema.js';
import { HostingApiError } from '../errors.js';

/** Expected absence is a value, not an exception. Transport failures still throw. */
export type Lookup<T> = { found: true; value: T } | { found: false };

export interface NewChangeRequest {
  base: string;
  /** `<forkOwner>:<branch>` for cross-repository requests. */
  head: string;
  title: string;
  body: string;
}

/** Hosting operations the propagation engine consumes. */
export interface HostingApi {
  getAuthenticatedLogin(): Promise<string>;
  getRepository(ref: RepoRef): Promise<Lookup<RepositoryInfo>>;
  listBranches(ref: RepoRef): Promise<BranchHead[]>;
  getBranch(ref: RepoRef, name: string): Promise<Lookup<BranchHead>>;
  createBranchRef(ref: RepoRef, name: string, sha: string): Promise<void>;
  updateBranchRef(ref: RepoRef, name: string, sha: string): Promise<void>;
  getChangeRequest(ref: RepoRef, number: number): Promise<Lookup<ChangeRequest>>;
  listChangeRequestCommits(ref: RepoRef, number: number): Promise<string[]>;
  findChangeRequests(
    ref: RepoRef,
    query: { base: string; head: string; state: ChangeRequestState },
  ): Promise<ChangeRequestSummary[]>;
  createChangeRequest(ref: RepoRef, input: NewChangeRequest): Promise<ChangeRequestSummary>;
  getLabels(ref: RepoRef, number: number): Promise<string[]>;
  setLabels(ref: RepoRef, number: number, labels: readonly string[]): Promise<void>;
  getChangeRequestPatch(ref: RepoRef, number: number): Promise<string>;
}

/**
 * GitHub implementation of {@link HostingApi} on top of Octokit.
 * 404s on single-resource reads become `{ found: false }`; everything else becomes a HostingApiError.
 */
export class GitHubClient implements HostingApi {
  private octokit: Octokit;

  constructor(octokit: Octokit) {
    this.octokit = octokit;
  }

  static create(token: string): GitHubClient {
    return new GitHubClient(new Octokit({ auth: token }));
  }

  async getAuthenticatedLogin(): Promise<string> {
    return request('get authenticated user', async () => {
      const { data } = await this.octokit.rest.users.getAuthenticated();
      return data.login;
    });
  }

  async getRepository(ref: RepoRef): Promise<Lookup<RepositoryInfo>> {
    return lookup(`get repository ${slug(ref)}`, async () => {
      const { data } = await this.octokit.rest.repos.get({ owner: ref.owner, repo: ref.repo });
      return {
        ref: { owner: data.owner.login, repo: data.name },
        parent: data.parent ? { owner: data.parent.owner.login, repo: data.parent.name } : null,
      };
    });
  }

  async listBranches(ref: RepoRef): Promise<BranchHead[]> {
    return request(`list branches of ${slug(ref)}`, async () => {
      const branches = await this.octokit.paginate(this.octokit.rest.repos.listBranches, {
        owner: ref.owner, repo: ref.repo, per_page: 100,
      });
      return branches.map((b) => ({ name: b.name, sha: b.commit.sha }));
    });
  }

  async getBranch(ref: RepoRef, name: string): Promise<Lookup<BranchHead>> {
    return lookup(`get branch ${name} of ${slug(ref)}`, async () => {
      const { data } = await this.octokit.rest.repos.getBranch({ owner: ref.owner, repo: ref.repo, branch: name });
      return { name: data.name, sha: data.commit.sha };
    });
  }

  async createBranchRef(ref: RepoRef, name: string, sha: string): Promise<void> {
    await request(`create branch ${name} in ${slug(ref)}`, async () => {
      await this.octokit.rest.git.createRef({ owner: ref.owner, repo: ref.repo, ref: `refs/heads/${name}`, sha });
    });
  }

  async updateBranchRef(ref: RepoRef, name: string, sha: string): Promise<void> {
    await request(`update branch ${name} in ${slug(ref)}`, async () => {
      await this.octokit.rest.git.updateRef({ owner: ref.owner, repo: ref.repo, ref: `heads/${name}`, sha, force: true });
    });
  }

  async getChangeRequest(ref: RepoRef, number: number): Promise<Lookup<ChangeRequest>> {
    return lookup(`get PR #${number} of ${slug(ref)}`, async () => {
      const { data } = await this.octokit.rest.pulls.get({ owner: ref.owner, repo: ref.repo, pull_number: number });
      return {
        number: data.number,
        title: data.title,
        url: data.html_url,
        state: data.state === 'open' ? 'open' : 'closed',
        baseBranch: data.base.ref,
        mergeCommitSha: data.merged ? data.merge_commit_sha : null,
        merged: data.merged,
        labels: data.labels.map((l) => l.name),
      } satisfies ChangeRequest;
    });
  }

  async listChangeRequestCommits(ref: RepoRef, number: number): Promise<string[]> {
    return request(`list commits of PR #${number}`, async () => {
      const commits = await this.octokit.paginate(this.octokit.rest.pulls.listCommits, {
        owner: ref.owner, repo: ref.repo, pull_number: number, per_page: 100,
      });
      return commits.map((c) => c.sha);
    });
  }

  /** GitHub has no "merged" list state: merged requests are closed ones with a merge date. */
  async findChangeRequests(
    ref: RepoRef,
    query: { base: string; head: string; state: ChangeRequestState },
  ): Promise<ChangeRequestSummary[]> {
    return request(`list PRs ${query.head} → ${query.base}`, async () => {
      const pulls = await this.octokit.paginate(this.octokit.rest.pulls.list, {
        owner: ref.owner,
        repo: ref.repo,
        base: query.base,
        head: query.head,
        state: query.state === 'open' ? 'open' : 'closed',
        per_page: 100,
      });
      return pulls
        .map((pr) => ({
          number: pr.number,
          url: pr.html_url,
          state: pr.state === 'open' ? ('open' as const) : ('closed' as const),
          merged: pr.merged_at !== null,
        }))
        .filter((pr) => (query.state === 'merged' ? pr.merged : true));
    });
  }

  async createChangeRequest(ref: RepoRef, input: NewChangeRequest): Promise<ChangeRequestSummary> {
    return request(`create PR ${input.head} → ${input.base}`, async () => {
      const { data } = await this.octokit.rest.pulls.create({
        owner: ref.owner, repo: ref.repo, title: input.title, body: input.body, head: input.head, base: input.base,
      });
      return { number: data.number, url: data.html_url, state: 'open', merged: false };
    });
  }

  async getLabels(ref: RepoRef, number: number): Promise<string[]> {
    return request(`get labels of #${number}`, async () => {
      const labels = await this.octokit.paginate(this.octokit.rest.issues.listLabelsOnIssue, {
        owner: ref.owner, repo: ref.repo, issue_number: number, per_page: 100,
      });
      return labels.map((l) => l.name);
    });
  }

  async setLabels(ref: RepoRef, number: number, labels: readonly string[]): Promise<void> {
    await request(`set labels of #${number}`, async () => {
      await this.octokit.rest.issues.setLabels({ owner: ref.owner, repo: ref.repo, issue_number: number, labels: [...labels] });
    });
  }

  /** The pull request rendered as an mbox patch series (`Accept: application/vnd.github.v3.patch`). */
  async getChangeRequestPatch(ref: RepoRef, number: number): Promise<string> {
    return request(`get patch of PR #${number}`, async () => {
      const response: { data: unknown } = await this.octokit.request('GET /repos/{owner}/{repo}/pulls/{pull_number}', {
        owner: ref.owner, repo: ref.repo, pull_number: number, mediaType: { format: 'patch' },
      });
      if (typeof response.data !== 'string') {
        throw new HostingApiError(`PR #${number} patch was not returned as text`, null);
      }
      return response.data;
    });
  }
}

// ─── Helpers ─────────────────────────────────────────────────────────

export function slug(ref: RepoRef): string {
  return `${ref.owner}/${ref.repo}`;
}

/** Run an API call, turning any failure into a HostingApiError. */
export async function request<T>(what: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (err) {
    throw toHostingError(what, err);
  }
}

/** Run a single-resource read; a 404 is reported as `{ found: false }`. */
export async function lookup<T>(what: string, fn: () => Promise<T>): Promise<Lookup<T>> {
  try {
    return { found: true, value: await fn() };
  } catch (err) {
    if (err instanceof RequestError && err.status === 404) return { found: false };
    throw toHostingError(what, err);
  }
}

function toHostingError(what: string, err: unknown): HostingApiError {
  if (err instanceof HostingApiError) return err;
  if (err instanceof RequestError) {
    return new HostingApiError(`Failed to ${what} (${err.status}): ${err.message}`, err.status, { cause: err });
  }
  return new HostingApiError(`Failed to ${what}: ${err instanceof Error ? err.message : String(err)}`, null, { cause: err });
}

/** Parse owner/repo from a GitHub clone URL (https or ssh). */
export function parseGitHubRemote(remoteUrl: string): RepoRef | null {
  const match = remoteUrl.trim().match(/github\.com[/:]([^/]+)\/([^/]+?)(?:\.git)?\/?$/);
  if (!match) return null;
  return { owner: match[1], repo: match[2] };
}
