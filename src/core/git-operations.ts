import { simpleGit, GitError, type SimpleGit } from 'simple-git';
import { existsSync, readFileSync, writeFileSync } from 'node:fs';
import { isAbsolute, join } from 'node:path';
import type { Commit, FetchSummary, PushOutcome, PushReport } from '../config/schema.js';

/** Multi-step git operations that can stop half-way and wait for a human. */
export type SequencerOperation = 'cherry-pick' | 'am';

export type StepResult =
  | { ok: true }
  | { ok: false; conflicts: string[]; detail: string };

export interface ConflictFile {
  path: string;
  oursContent: string;
  theirsContent: string;
  baseContent: string;
}

/** Local working copy operations the propagation engine consumes. */
export interface WorkingCopy {
  /** Branch name, or the commit hash when HEAD is detached. */
  getCurrentRef(): Promise<string>;
  /** Tracked changes only; untracked files do not make the tree dirty. */
  isDirty(): Promise<boolean>;
  getRemoteUrl(remote: string): Promise<string | null>;
  fetch(remote: string, options: { dryRun: boolean }): Promise<FetchSummary>;
  revParse(ref: string): Promise<string | null>;
  localBranchExists(name: string): Promise<boolean>;
  createTrackingBranch(name: string, upstreamRef: string): Promise<void>;
  checkout(ref: string): Promise<void>;
  /** Move the checked-out branch to `ref`, discarding its commits and any tracked changes. */
  resetHard(ref: string): Promise<void>;
  log(from: string, maxCount: number): Promise<Commit[]>;
  cherryPick(sha: string, options: { signoff: boolean }): Promise<StepResult>;
  applyMailbox(patchPath: string): Promise<StepResult>;
  isPatchApplied(patchPath: string): Promise<boolean>;
  operationInProgress(): Promise<SequencerOperation | null>;
  hasStagedChanges(): Promise<boolean>;
  continueOperation(op: SequencerOperation): Promise<void>;
  skipOperation(op: SequencerOperation): Promise<void>;
  abortOperation(op: SequencerOperation): Promise<void>;
  conflictedFiles(): Promise<string[]>;
  isAncestor(ancestor: string, descendant: string): Promise<boolean>;
  push(remote: string, branch: string, options: { force: boolean }): Promise<PushReport>;
}

/**
 * Low-level git operations for the local clone of the fork.
 * Wraps simple-git with methods for fetch, cherry-pick, mailbox apply, conflict detection and push.
 */
export class GitOperations implements WorkingCopy {
  private git: SimpleGit;
  private repoPath: string;

  constructor(repoPath: string) {
    this.repoPath = repoPath;
    this.git = simpleGit(repoPath);
  }

  // ─── State Inspection ──────────────────────────────────────────────

  async getCurrentRef(): Promise<string> {
    const name = (await this.git.revparse(['--abbrev-ref', 'HEAD'])).trim();
    if (name !== 'HEAD') return name;
    return (await this.git.revparse(['HEAD'])).trim();
  }

  async isDirty(): Promise<boolean> {
    const status = await this.git.status();
    return status.files.some((f) => !(f.index === '?' && f.working_dir === '?'));
  }

  async getRemoteUrl(remote: string): Promise<string | null> {
    const remotes = await this.git.getRemotes(true);
    const found = remotes.find((r) => r.name === remote);
    return found ? found.refs.fetch || found.refs.push : null;
  }

  async revParse(ref: string): Promise<string | null> {
    try {
      return (await this.git.raw(['rev-parse', '--verify', '--quiet', `${ref}^{commit}`])).trim() || null;
    } catch (err) {
      if (err instanceof GitError) return null;
      throw err;
    }
  }

  async conflictedFiles(): Promise<string[]> {
    const status = await this.git.status();
    return status.conflicted;
  }

  async hasStagedChanges(): Promise<boolean> {
    const names = await this.git.raw(['diff', '--cached', '--name-only']);
    return names.trim().length > 0;
  }

  /** simple-git only fails on stderr output, so exit-code-only probes like `--is-ancestor` can't be used. */
  async isAncestor(ancestor: string, descendant: string): Promise<boolean> {
    try {
      const base = (await this.git.raw(['merge-base', ancestor, descendant])).trim();
      return base === ancestor;
    } catch (err) {
      if (err instanceof GitError) return false;
      throw err;
    }
  }

  async operationInProgress(): Promise<SequencerOperation | null> {
    const gitDir = await this.gitDir();
    if (existsSync(join(gitDir, 'CHERRY_PICK_HEAD'))) return 'cherry-pick';
    if (existsSync(join(gitDir, 'rebase-apply', 'applying'))) return 'am';
    return null;
  }

  private async gitDir(): Promise<string> {
    const dir = (await this.git.revparse(['--git-dir'])).trim();
    return isAbsolute(dir) ? dir : join(this.repoPath, dir);
  }

  // ─── Fetch ─────────────────────────────────────────────────────────

  async fetch(remote: string, options: { dryRun: boolean }): Promise<FetchSummary> {
    const result = await this.git.fetch(remote, options.dryRun ? { '--dry-run': null } : {});
    return {
      remote,
      updated: [
        ...result.branches.map((b) => ({ name: b.tracking, from: null, to: null })),
        ...result.updated.map((u) => ({ name: u.tracking, from: u.from, to: u.to })),
      ],
    };
  }

  // ─── Branch Operations ────────────────────────────────────────────

  async localBranchExists(name: string): Promise<boolean> {
    return (await this.revParse(`refs/heads/${name}`)) !== null;
  }

  async createTrackingBranch(name: string, upstreamRef: string): Promise<void> {
    await this.git.raw(['branch', '--track', name, upstreamRef]);
  }

  async checkout(ref: string): Promise<void> {
    await this.git.checkout(ref);
  }

  async resetHard(ref: string): Promise<void> {
    await this.git.reset(['--hard', ref]);
  }

  // ─── Commit Listing ───────────────────────────────────────────────

  /** Walk back from `from`, newest first (plain `git log` order). */
  async log(from: string, maxCount: number): Promise<Commit[]> {
    const log = await this.git.log([`--max-count=${maxCount}`, from]);
    return log.all.map((c) => ({ hash: c.hash, subject: c.message, author: c.author_name }));
  }

  // ─── Replay Operations ────────────────────────────────────────────

  /** `-x` records "(cherry picked from commit …)" in the new message; authorship is kept by git. */
  async cherryPick(sha: string, options: { signoff: boolean }): Promise<StepResult> {
    const args = ['cherry-pick', '-x', ...(options.signoff ? ['-s'] : []), sha];
    return this.runStep(args, 'cherry-pick');
  }

  async applyMailbox(patchPath: string): Promise<StepResult> {
    return this.runStep(['am', '-3', patchPath], 'am');
  }

  async isPatchApplied(patchPath: string): Promise<boolean> {
    try {
      await this.git.raw(['apply', '--check', '--reverse', patchPath]);
      return true;
    } catch (err) {
      if (err instanceof GitError && /patch does not apply|does not exist in index|No such file/i.test(err.message)) return false;
      throw err;
    }
  }

  /** A failed step is reported (not thrown) when git stopped mid-operation and is waiting for resolution. */
  private async runStep(args: string[], op: SequencerOperation): Promise<StepResult> {
    try {
      await this.git.raw(args);
      return { ok: true };
    } catch (err) {
      if (!(err instanceof GitError)) throw err;
      const conflicts = await this.conflictedFiles();
      if (conflicts.length > 0 || (await this.operationInProgress()) === op) {
        return { ok: false, conflicts, detail: err.message.trim() };
      }
      throw err;
    }
  }

  async continueOperation(op: SequencerOperation): Promise<void> {
    await this.git.raw(['-c', 'core.editor=true', op, '--continue']);
  }

  async skipOperation(op: SequencerOperation): Promise<void> {
    await this.git.raw([op, '--skip']);
  }

  async abortOperation(op: SequencerOperation): Promise<void> {
    await this.git.raw([op, '--abort']);
  }

  // ─── Push ─────────────────────────────────────────────────────────

  /**
   * Push `branch` to the same name on `remote` and classify what happened to the remote ref.
   * The remote-tracking ref is compared before and after so a silent no-op is caught.
   */
  async push(remote: string, branch: string, options: { force: boolean }): Promise<PushReport> {
    const trackingRef = `refs/remotes/${remote}/${branch}`;
    const before = await this.revParse(trackingRef);
    const local = await this.revParse(`refs/heads/${branch}`);
    if (!local) throw new Error(`Local branch ${branch} does not exist`);

    const fastForward = before !== null && before !== local ? await this.isAncestor(before, local) : false;
    await this.git.push(remote, `refs/heads/${branch}:refs/heads/${branch}`, options.force ? ['--force'] : []);

    const after = await this.revParse(trackingRef);
    if (after !== local) {
      throw new Error(`Push of ${branch} to ${remote} did not update ${trackingRef} (expected ${local}, found ${after ?? 'nothing'})`);
    }
    return { outcome: classifyPush(before, local, fastForward), remoteRef: trackingRef, from: before, to: local };
  }

  // ─── Conflict Inspection ──────────────────────────────────────────

  async getConflictedFiles(): Promise<ConflictFile[]> {
    const files: ConflictFile[] = [];
    for (const filePath of await this.conflictedFiles()) {
      const fullPath = join(this.repoPath, filePath);
      if (!existsSync(fullPath)) {
        files.push({ path: filePath, oursContent: '', theirsContent: '', baseContent: '' });
        continue;
      }
      const { ours, theirs, base } = parseConflictMarkers(readFileSync(fullPath, 'utf-8'));
      files.push({ path: filePath, oursContent: ours, theirsContent: theirs, baseContent: base });
    }
    return files;
  }

  /** Current content of a working tree file, conflict markers included. */
  readWorkingFile(filePath: string): string {
    const fullPath = join(this.repoPath, filePath);
    return existsSync(fullPath) ? readFileSync(fullPath, 'utf-8') : '';
  }

  // ─── Resolution ───────────────────────────────────────────────────

  async resolveFile(filePath: string, content: string): Promise<void> {
    writeFileSync(join(this.repoPath, filePath), content, 'utf-8');
    await this.git.add(filePath);
  }

  async resolveUseOurs(filePath: string): Promise<void> {
    await this.git.raw(['checkout', '--ours', '--', filePath]);
    await this.git.add(filePath);
  }

  async resolveUseTheirs(filePath: string): Promise<void> {
    await this.git.raw(['checkout', '--theirs', '--', filePath]);
    await this.git.add(filePath);
  }

  get path(): string {
    return this.repoPath;
  }
}

/** Classify a push from the remote ref's value before it and the local head pushed. */
export function classifyPush(before: string | null, after: string, fastForward: boolean): PushOutcome {
  if (before === null) return 'new-ref';
  if (before === after) return 'up-to-date';
  return fastForward ? 'fast-forward' : 'forced-update';
}

export function parseConflictMarkers(content: string): { ours: string; theirs: string; base: string } {
  const lines = content.split('\n');
  let ours = '', theirs = '', base = '';
  let section: 'none' | 'ours' | 'base' | 'theirs' = 'none';

  for (const line of lines) {
    if (line.startsWith('<<<<<<<')) section = 'ours';
    else if (line.startsWith('|||||||')) section = 'base';
    else if (line.startsWith('=======')) section = 'theirs';
    else if (line.startsWith('>>>>>>>')) section = 'none';
    else if (section === 'ours') ours += line + '\n';
    else if (section === 'base') base += line + '\n';
    else if (section === 'theirs') theirs += line + '\n';
  }
  return { ours: ours.trimEnd(), theirs: theirs.trimEnd(), base: base.trimEnd() };
}
