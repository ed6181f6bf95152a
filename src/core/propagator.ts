import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type {
  ChangeRequest,
  Commit,
  CompletionReport,
  FetchSummary,
  PropagationTask,
  RepoRef,
  ReplayPlan,
  RunConfig,
  RunReport,
} from '../config/schema.js';
import { APP_NAME } from '../config/branding.js';
import type { HostingApi } from '../github/client.js';
import { parseGitHubRemote, slug } from '../github/client.js';
import type { WorkingCopy } from './git-operations.js';
import type { ConflictResolutionStrategy } from './conflict-resolver.js';
import { selectTargetBranches } from './branch-patterns.js';
import { ForkSynchronizer } from './fork-sync.js';
import { CommitExtractor } from './commit-extractor.js';
import { CherryPickExecutor } from './cherry-pick-executor.js';
import { PullRequestPublisher, type Confirm } from './publisher.js';
import { CompletionTracker } from './completion-tracker.js';
import { isPropagated, labelsToBranches } from './naming.js';
import { createTask, fail, transition } from './task.js';
import { RepoValidationError } from '../errors.js';
import type { Logger } from '../ui/logger.js';
import { shortSha } from '../ui/logger.js';

export interface PropagatorDeps {
  config: RunConfig;
  hosting: HostingApi;
  git: WorkingCopy;
  resolver: ConflictResolutionStrategy;
  confirm: Confirm;
  logger: Logger;
}

export interface ForkPair {
  login: string;
  fork: RepoRef;
  upstream: RepoRef;
}

/**
 * Check that the working copy is a clone of the operator's own fork and find the fork's parent.
 * Nothing remote or local is modified before this passes.
 */
export async function resolveForkPair(
  hosting: HostingApi,
  git: WorkingCopy,
  config: RunConfig,
  options: { requireClean: boolean },
): Promise<ForkPair> {
  const { remotes } = config.settings;
  const login = await hosting.getAuthenticatedLogin();

  const url = await git.getRemoteUrl(remotes.fork);
  if (!url) throw new RepoValidationError(`Remote '${remotes.fork}' is not configured in ${config.repoPath}`);
  const parsed = parseGitHubRemote(url);
  if (!parsed) throw new RepoValidationError(`Remote '${remotes.fork}' (${url}) is not a GitHub repository`);
  if (parsed.owner.toLowerCase() !== login.toLowerCase()) {
    throw new RepoValidationError(`Remote '${remotes.fork}' points to ${slug(parsed)}, which is not owned by ${login}`);
  }
  if (!(await git.getRemoteUrl(remotes.upstream))) {
    throw new RepoValidationError(`Remote '${remotes.upstream}' is not configured. Add it with: git remote add ${remotes.upstream} <url>`);
  }
  if (options.requireClean && (await git.isDirty())) {
    throw new RepoValidationError(`Working tree in ${config.repoPath} has uncommitted changes`);
  }

  const repository = await hosting.getRepository(parsed);
  if (!repository.found) throw new RepoValidationError(`Repository ${slug(parsed)} not found`);
  const { parent } = repository.value;
  if (!parent) throw new RepoValidationError(`Repository ${slug(parsed)} is not a fork`);
  return { login, fork: repository.value.ref, upstream: parent };
}

/** Fetch one source pull request from upstream or fail the run. */
export async function fetchSource(hosting: HostingApi, upstream: RepoRef, prNumber: number): Promise<ChangeRequest> {
  const found = await hosting.getChangeRequest(upstream, prNumber);
  if (!found.found) throw new RepoValidationError(`PR #${prNumber} not found in ${slug(upstream)}`);
  return found.value;
}

/**
 * One propagation run: validate the clone, pick the targets, mirror them into the fork,
 * replay the source onto each `pr/<id>/<target>` branch, publish, and mark the source
 * complete once every declared target has a request.
 *
 * Setup failures throw before anything is pushed. A failure on one target is recorded
 * on its task and the run moves on.
 */
export class Propagator {
  private deps: PropagatorDeps;

  constructor(deps: PropagatorDeps) {
    this.deps = deps;
  }

  async run(): Promise<RunReport> {
    const { config, hosting, git, logger } = this.deps;
    const { settings } = config;

    logger.step('Checking repository');
    const { fork, upstream } = await resolveForkPair(hosting, git, config, { requireClean: true });
    logger.info(`Fork ${slug(fork)}, upstream ${slug(upstream)}`);

    const source = await fetchSource(hosting, upstream, config.prNumber);
    logger.info(`PR #${source.number}: ${source.title} (${source.merged ? 'merged' : source.state})`);
    if (isPropagated(source.labels, settings.labels)) {
      logger.success(`PR #${source.number} is already labeled ${settings.labels.completed}, nothing to do`);
      return {
        source,
        status: 'already-propagated',
        sync: [],
        tasks: [],
        completion: { declared: [], missing: [], status: 'already-labeled' },
      };
    }

    const patterns = config.branches ?? labelsToBranches(source.labels, settings.labels);
    const upstreamBranches = (await hosting.listBranches(upstream)).map((b) => b.name);
    const targets = selectTargetBranches(patterns, upstreamBranches, source.baseBranch, slug(upstream));
    logger.info(`Target branches: ${targets.join(', ')}`);

    logger.step('Synchronizing fork');
    const sync = await new ForkSynchronizer(hosting, logger).sync(fork, upstream, targets, config.dryRun);
    await this.fetchRemotes();

    const publisher = new PullRequestPublisher(hosting, git, logger, this.deps.confirm, {
      fork,
      upstream,
      forkRemote: settings.remotes.fork,
      titleStripPrefix: settings.title_strip_prefix,
      confirmCreate: config.confirmCreate,
    });
    const executor = new CherryPickExecutor(git, this.deps.resolver, logger, {
      forkRemote: settings.remotes.fork,
      signoff: settings.signoff,
    });
    const tasks = targets.map((target) => createTask(source, target, settings.local_branch_prefix));

    const originalRef = await git.getCurrentRef();
    let patchDir: string | null = null;
    try {
      let plan: ReplayPlan | null = null;
      if (!config.dryRun) {
        if (source.merged) {
          plan = { kind: 'commits', commits: await this.extractCommits(upstream, source) };
        } else {
          patchDir = await mkdtemp(join(tmpdir(), `${APP_NAME}-`));
          plan = { kind: 'patch', path: await this.downloadPatch(upstream, source, patchDir) };
        }
      }

      for (const task of tasks) {
        logger.step(`${task.target} (${task.localBranch})`);
        try {
          await this.propagateOne(task, plan, executor, publisher);
        } catch (err) {
          const error = err instanceof Error ? err : new Error(String(err));
          fail(task, error);
          logger.error(`${task.target}: ${error.message}`);
        }
      }
    } finally {
      await this.restore(originalRef, patchDir);
    }

    logger.step('Checking completion');
    const completion = await this.trackCompletion(source, upstream, publisher);
    return { source, status: 'completed', sync, tasks, completion };
  }

  private async propagateOne(
    task: PropagationTask,
    plan: ReplayPlan | null,
    executor: CherryPickExecutor,
    publisher: PullRequestPublisher,
  ): Promise<void> {
    const { logger } = this.deps;

    const existing = await publisher.findExisting(task.localBranch, task.target);
    if (existing) {
      task.result = existing;
      transition(task, 'existing');
      logger.info(`PR already exists: ${existing.url}`);
      return;
    }

    if (plan === null) {
      logger.dryRun(`replay PR #${task.source.number} onto ${task.localBranch}`);
      logger.dryRun(`push ${task.localBranch} to ${this.deps.config.settings.remotes.fork} and open a PR against ${task.target}`);
      transition(task, 'planned');
      return;
    }

    await executor.prepare(task);
    await executor.replay(task, plan);
    if (task.status !== 'replayed') return;
    await publisher.publish(task);
  }

  private async extractCommits(upstream: RepoRef, source: ChangeRequest): Promise<Commit[]> {
    const { hosting, git, logger, config } = this.deps;
    const commits = await new CommitExtractor(hosting, git).extract(upstream, source, config.settings.remotes.upstream);
    if (commits.length === 0) {
      logger.warn(`PR #${source.number} has no commits to replay`);
    } else {
      logger.info(`${commits.length} commit(s) to replay:`);
      for (const c of commits) logger.debug(`${shortSha(c.hash)} ${c.subject}`);
    }
    return commits;
  }

  /** Unmerged sources are replayed from GitHub's mbox rendering of the request. */
  private async downloadPatch(upstream: RepoRef, source: ChangeRequest, dir: string): Promise<string> {
    const { hosting, logger } = this.deps;
    logger.warn(`PR #${source.number} is not merged; replaying its patch instead of commits`);
    const patch = await hosting.getChangeRequestPatch(upstream, source.number);
    const path = join(dir, `${source.number}.patch`);
    await writeFile(path, patch, 'utf-8');
    logger.debug(`Patch saved to ${path}`);
    return path;
  }

  private async fetchRemotes(): Promise<void> {
    const { git, logger, config } = this.deps;
    const { remotes } = config.settings;
    for (const remote of [remotes.fork, remotes.upstream]) {
      const spinner = logger.spin(`Fetching ${remote}${config.dryRun ? ' (dry run)' : ''}...`);
      let summary: FetchSummary;
      try {
        summary = await git.fetch(remote, { dryRun: config.dryRun });
      } catch (err) {
        spinner.fail(`Fetch of ${remote} failed`);
        throw new RepoValidationError(`Failed to fetch '${remote}': ${err instanceof Error ? err.message : String(err)}`, { cause: err });
      }
      spinner.succeed(`Fetched ${remote}`);
      for (const ref of summary.updated) {
        logger.debug(`${ref.name}: ${shortSha(ref.from)} -> ${shortSha(ref.to)}`);
      }
    }
  }

  private async restore(originalRef: string, patchDir: string | null): Promise<void> {
    const { git, logger } = this.deps;
    try {
      if ((await git.getCurrentRef()) !== originalRef) {
        await git.checkout(originalRef);
        logger.debug(`Checked out ${originalRef} again`);
      }
    } catch (err) {
      logger.error(`Could not check out ${originalRef} again: ${err instanceof Error ? err.message : String(err)}`);
    }
    if (patchDir) await rm(patchDir, { recursive: true, force: true });
  }

  private async trackCompletion(
    source: ChangeRequest,
    upstream: RepoRef,
    publisher: PullRequestPublisher,
  ): Promise<CompletionReport | null> {
    const { hosting, logger, config } = this.deps;
    const tracker = new CompletionTracker(hosting, publisher, logger, {
      upstream,
      labels: config.settings.labels,
      branchPrefix: config.settings.local_branch_prefix,
    });
    try {
      return await tracker.check(source, { apply: true, dryRun: config.dryRun });
    } catch (err) {
      logger.error(`Completion check failed: ${err instanceof Error ? err.message : String(err)}`);
      return null;
    }
  }
}
