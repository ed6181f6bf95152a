import type {
  BranchHead,
  ChangeRequest,
  ChangeRequestState,
  ChangeRequestSummary,
  Commit,
  FetchSummary,
  PushReport,
  RepoRef,
  RepositoryInfo,
} from '../../src/config/schema.js';
import type { HostingApi, Lookup, NewChangeRequest } from '../../src/github/client.js';
import type { SequencerOperation, StepResult, WorkingCopy } from '../../src/core/git-operations.js';
import { classifyPush } from '../../src/core/git-operations.js';
import type { ConflictContext, ConflictDecision, ConflictResolutionStrategy } from '../../src/core/conflict-resolver.js';

export const FORK: RepoRef = { owner: 'alice', repo: 'widgets' };
export const UPSTREAM: RepoRef = { owner: 'acme', repo: 'widgets' };

const key = (ref: RepoRef): string => `${ref.owner}/${ref.repo}`;

export interface FakePull extends ChangeRequestSummary {
  base: string;
  head: string;
  title: string;
  body: string;
}

export function makeChangeRequest(overrides: Partial<ChangeRequest> = {}): ChangeRequest {
  return {
    number: 42,
    title: 'Fix widget alignment',
    url: 'https://github.com/acme/widgets/pull/42',
    state: 'closed',
    baseBranch: 'main',
    mergeCommitSha: 'merge42',
    merged: true,
    labels: [],
    ...overrides,
  };
}

/** In-memory hosting service. Records every mutating call in `mutations`. */
export class FakeHosting implements HostingApi {
  login = 'alice';
  repositories = new Map<string, RepositoryInfo>();
  branches = new Map<string, Map<string, string>>();
  changeRequests = new Map<number, ChangeRequest>();
  commits = new Map<number, string[]>();
  labels = new Map<number, string[]>();
  patches = new Map<number, string>();
  pulls: FakePull[] = [];
  mutations: string[] = [];
  private nextNumber = 100;

  constructor() {
    this.repositories.set(key(FORK), { ref: FORK, parent: UPSTREAM });
    this.repositories.set(key(UPSTREAM), { ref: UPSTREAM, parent: null });
  }

  setBranches(ref: RepoRef, heads: Record<string, string>): void {
    this.branches.set(key(ref), new Map(Object.entries(heads)));
  }

  addSource(source: ChangeRequest, commits: string[]): void {
    this.changeRequests.set(source.number, source);
    this.commits.set(source.number, commits);
    this.labels.set(source.number, [...source.labels]);
  }

  addPull(pull: Omit<FakePull, 'url' | 'title' | 'body'>): void {
    this.pulls.push({ ...pull, url: `https://github.com/acme/widgets/pull/${pull.number}`, title: '', body: '' });
  }

  get created(): FakePull[] {
    return this.pulls.filter((p) => p.number >= 100);
  }

  async getAuthenticatedLogin(): Promise<string> {
    return this.login;
  }

  async getRepository(ref: RepoRef): Promise<Lookup<RepositoryInfo>> {
    const repo = this.repositories.get(key(ref));
    return repo ? { found: true, value: repo } : { found: false };
  }

  async listBranches(ref: RepoRef): Promise<BranchHead[]> {
    return [...(this.branches.get(key(ref)) ?? new Map<string, string>())].map(([name, sha]) => ({ name, sha }));
  }

  async getBranch(ref: RepoRef, name: string): Promise<Lookup<BranchHead>> {
    const sha = this.branches.get(key(ref))?.get(name);
    return sha === undefined ? { found: false } : { found: true, value: { name, sha } };
  }

  async createBranchRef(ref: RepoRef, name: string, sha: string): Promise<void> {
    this.mutations.push(`create ${key(ref)}:${name}`);
    this.branchMap(ref).set(name, sha);
  }

  async updateBranchRef(ref: RepoRef, name: string, sha: string): Promise<void> {
    this.mutations.push(`update ${key(ref)}:${name}`);
    this.branchMap(ref).set(name, sha);
  }

  async getChangeRequest(_ref: RepoRef, number: number): Promise<Lookup<ChangeRequest>> {
    const found = this.changeRequests.get(number);
    if (!found) return { found: false };
    return { found: true, value: { ...found, labels: this.labels.get(number) ?? found.labels } };
  }

  async listChangeRequestCommits(_ref: RepoRef, number: number): Promise<string[]> {
    return this.commits.get(number) ?? [];
  }

  async findChangeRequests(
    _ref: RepoRef,
    query: { base: string; head: string; state: ChangeRequestState },
  ): Promise<ChangeRequestSummary[]> {
    return this.pulls
      .filter((p) => p.base === query.base && p.head === query.head)
      .filter((p) => (query.state === 'open' ? p.state === 'open' : p.merged))
      .map(({ number, url, state, merged }) => ({ number, url, state, merged }));
  }

  async createChangeRequest(_ref: RepoRef, input: NewChangeRequest): Promise<ChangeRequestSummary> {
    const number = this.nextNumber++;
    const pull: FakePull = {
      number,
      url: `https://github.com/acme/widgets/pull/${number}`,
      state: 'open',
      merged: false,
      ...input,
    };
    this.pulls.push(pull);
    this.mutations.push(`pr ${input.head} -> ${input.base}`);
    return { number, url: pull.url, state: 'open', merged: false };
  }

  async getLabels(_ref: RepoRef, number: number): Promise<string[]> {
    return [...(this.labels.get(number) ?? [])];
  }

  async setLabels(_ref: RepoRef, number: number, labels: readonly string[]): Promise<void> {
    this.mutations.push(`labels #${number}: ${labels.join(',')}`);
    this.labels.set(number, [...labels]);
  }

  async getChangeRequestPatch(_ref: RepoRef, number: number): Promise<string> {
    return this.patches.get(number) ?? '';
  }

  private branchMap(ref: RepoRef): Map<string, string> {
    let map = this.branches.get(key(ref));
    if (!map) {
      map = new Map();
      this.branches.set(key(ref), map);
    }
    return map;
  }
}

/**
 * In-memory working copy. Branch heads are strings; every replayed step appends `+<step>` to the head.
 * Steps listed in `conflictsOn` stop with the given files, once per branch. Steps in `emptyOn`
 * stop the way git does on a pick whose changes are already on the branch.
 */
export class FakeWorkingCopy implements WorkingCopy {
  currentRef = 'main';
  dirty = false;
  remotes: Record<string, string> = {
    origin: 'git@github.com:alice/widgets.git',
    upstream: 'https://github.com/acme/widgets.git',
  };
  localBranches = new Map<string, string>([['main', 'main-head']]);
  trackingRefs = new Map<string, string>();
  objects = new Set<string>();
  history = new Map<string, Commit[]>();
  conflictsOn = new Map<string, string[]>();
  emptyOn = new Set<string>();
  inProgress: { op: SequencerOperation; step: string; empty?: boolean } | null = null;
  conflicted: string[] = [];
  staged = true;
  patchApplied = false;
  calls: string[] = [];

  async getCurrentRef(): Promise<string> {
    return this.currentRef;
  }

  async isDirty(): Promise<boolean> {
    return this.dirty;
  }

  async getRemoteUrl(remote: string): Promise<string | null> {
    return this.remotes[remote] ?? null;
  }

  async fetch(remote: string, options: { dryRun: boolean }): Promise<FetchSummary> {
    this.calls.push(`fetch ${remote}${options.dryRun ? ' --dry-run' : ''}`);
    return { remote, updated: [] };
  }

  async revParse(ref: string): Promise<string | null> {
    if (ref.startsWith('refs/heads/')) return this.localBranches.get(ref.slice('refs/heads/'.length)) ?? null;
    return this.objects.has(ref) ? ref : null;
  }

  async localBranchExists(name: string): Promise<boolean> {
    return this.localBranches.has(name);
  }

  async createTrackingBranch(name: string, upstreamRef: string): Promise<void> {
    const start = this.trackingRefs.get(upstreamRef);
    if (start === undefined) throw new Error(`fatal: not a valid object name: '${upstreamRef}'`);
    this.calls.push(`branch ${name} ${upstreamRef}`);
    this.localBranches.set(name, start);
  }

  async checkout(ref: string): Promise<void> {
    this.calls.push(`checkout ${ref}`);
    this.currentRef = ref;
  }

  async resetHard(ref: string): Promise<void> {
    const sha = this.trackingRefs.get(ref);
    if (sha === undefined) throw new Error(`fatal: ambiguous argument '${ref}': unknown revision`);
    this.calls.push(`reset --hard ${ref}`);
    this.localBranches.set(this.currentRef, sha);
  }

  async log(from: string, maxCount: number): Promise<Commit[]> {
    return (this.history.get(from) ?? []).slice(0, maxCount);
  }

  async cherryPick(sha: string): Promise<StepResult> {
    return this.step('cherry-pick', sha);
  }

  async applyMailbox(patchPath: string): Promise<StepResult> {
    return this.step('am', patchPath);
  }

  async isPatchApplied(): Promise<boolean> {
    return this.patchApplied;
  }

  async operationInProgress(): Promise<SequencerOperation | null> {
    return this.inProgress?.op ?? null;
  }

  async hasStagedChanges(): Promise<boolean> {
    if (this.inProgress?.empty) return false;
    return this.staged;
  }

  async continueOperation(op: SequencerOperation): Promise<void> {
    this.calls.push(`${op} --continue`);
    if (this.inProgress) this.advance(this.inProgress.step);
    this.inProgress = null;
  }

  async skipOperation(op: SequencerOperation): Promise<void> {
    this.calls.push(`${op} --skip`);
    this.inProgress = null;
  }

  async abortOperation(op: SequencerOperation): Promise<void> {
    this.calls.push(`${op} --abort`);
    this.inProgress = null;
    this.conflicted = [];
  }

  async conflictedFiles(): Promise<string[]> {
    return [...this.conflicted];
  }

  async isAncestor(): Promise<boolean> {
    return true;
  }

  async push(remote: string, branch: string, options: { force: boolean }): Promise<PushReport> {
    this.calls.push(`push ${remote} ${branch}${options.force ? ' --force' : ''}`);
    const local = this.localBranches.get(branch);
    if (local === undefined) throw new Error(`Local branch ${branch} does not exist`);
    const trackingRef = `${remote}/${branch}`;
    const before = this.trackingRefs.get(trackingRef) ?? null;
    this.trackingRefs.set(trackingRef, local);
    return { outcome: classifyPush(before, local, true), remoteRef: `refs/remotes/${trackingRef}`, from: before, to: local };
  }

  get pushes(): string[] {
    return this.calls.filter((c) => c.startsWith('push '));
  }

  private step(op: SequencerOperation, step: string): StepResult {
    this.calls.push(`${op} ${step} on ${this.currentRef}`);
    if (this.emptyOn.has(`${this.currentRef}:${step}`)) {
      this.inProgress = { op, step, empty: true };
      this.conflicted = [];
      return { ok: false, conflicts: [], detail: 'The previous cherry-pick is now empty' };
    }
    const files = this.conflictsOn.get(`${this.currentRef}:${step}`);
    if (files) {
      this.conflictsOn.delete(`${this.currentRef}:${step}`);
      this.inProgress = { op, step };
      this.conflicted = [...files];
      return { ok: false, conflicts: [...files], detail: `error: could not apply ${step}` };
    }
    this.advance(step);
    return { ok: true };
  }

  private advance(step: string): void {
    const head = this.localBranches.get(this.currentRef) ?? '';
    this.localBranches.set(this.currentRef, `${head}+${step}`);
  }
}

/** Conflict strategy that answers from a script and records what it was asked. */
export class ScriptedResolver implements ConflictResolutionStrategy {
  contexts: ConflictContext[] = [];
  private decisions: Array<(context: ConflictContext) => ConflictDecision>;

  constructor(...decisions: Array<(context: ConflictContext) => ConflictDecision>) {
    this.decisions = decisions;
  }

  async resolve(context: ConflictContext): Promise<ConflictDecision> {
    this.contexts.push(context);
    const next = this.decisions.shift();
    if (!next) throw new Error(`No scripted decision for ${context.step}`);
    return next(context);
  }
}
