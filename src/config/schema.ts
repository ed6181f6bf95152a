import { z } from 'zod';

// ─── Remotes ───────────────────────────────────────────────────────

/** Local remote names: `fork` is the operator's copy, `upstream` its parent. */
export const RemotesSchema = z.object({
  fork: z.string().min(1).default('origin'),
  upstream: z.string().min(1).default('upstream'),
});

// ─── Label Conventions ─────────────────────────────────────────────

export const LabelSettingsSchema = z.object({
  target_prefix: z.string().min(1).default('pr:'),
  completed: z.string().min(1).default('pr-merged'),
});

export type LabelSettings = z.infer<typeof LabelSettingsSchema>;

// ─── Settings File ─────────────────────────────────────────────────

export const SettingsSchema = z.object({
  remotes: RemotesSchema.default(() => RemotesSchema.parse({})),
  labels: LabelSettingsSchema.default(() => LabelSettingsSchema.parse({})),
  local_branch_prefix: z
    .string()
    .min(1)
    .regex(/^[^\s~^:?*[\\]+$/, 'must be a valid ref component')
    .default('pr'),
  /** Removed from the target branch when building the new PR title (e.g. "eve-kernel-"). */
  title_strip_prefix: z.string().default(''),
  signoff: z.boolean().default(true),
  confirm_create: z.boolean().default(true),
});

export type Settings = z.infer<typeof SettingsSchema>;

// ─── CLI Run Options ───────────────────────────────────────────────

export const RunOptionsSchema = z.object({
  pr: z.coerce.number().int().positive(),
  branches: z
    .string()
    .optional()
    .transform((raw) =>
      raw === undefined
        ? undefined
        : raw.split(',').map((b) => b.trim()).filter((b) => b.length > 0),
    ),
  dryRun: z.boolean().default(false),
  verbose: z.boolean().default(false),
  yes: z.boolean().default(false),
  interactive: z.boolean().default(true),
  cwd: z.string().default(() => process.cwd()),
});

export type RunOptionsInput = z.input<typeof RunOptionsSchema>;

/** Immutable configuration built once per run and handed to every component. */
export interface RunConfig {
  readonly prNumber: number;
  /** Explicit target patterns; overrides the `pr:` labels when set. */
  readonly branches: readonly string[] | undefined;
  readonly dryRun: boolean;
  readonly verbose: boolean;
  readonly interactive: boolean;
  readonly confirmCreate: boolean;
  readonly repoPath: string;
  readonly settings: Readonly<Settings>;
}

// ─── Hosting Model ─────────────────────────────────────────────────

export interface RepoRef {
  owner: string;
  repo: string;
}

export interface RepositoryInfo {
  ref: RepoRef;
  parent: RepoRef | null;
}

export interface BranchHead {
  name: string;
  sha: string;
}

export interface ChangeRequest {
  readonly number: number;
  readonly title: string;
  readonly url: string;
  readonly state: 'open' | 'closed';
  readonly baseBranch: string;
  /** Set only once merged. */
  readonly mergeCommitSha: string | null;
  readonly merged: boolean;
  readonly labels: readonly string[];
}

export interface ChangeRequestSummary {
  number: number;
  url: string;
  state: 'open' | 'closed';
  merged: boolean;
}

export type ChangeRequestState = 'open' | 'merged';

// ─── Version Control Model ─────────────────────────────────────────

export interface Commit {
  hash: string;
  subject: string;
  author: string;
}

export type PushOutcome = 'up-to-date' | 'fast-forward' | 'new-ref' | 'forced-update';

export interface PushReport {
  outcome: PushOutcome;
  remoteRef: string;
  from: string | null;
  to: string;
}

export interface FetchedRef {
  name: string;
  from: string | null;
  to: string | null;
}

export interface FetchSummary {
  remote: string;
  updated: FetchedRef[];
}

// ─── Fork Sync ─────────────────────────────────────────────────────

export interface SyncOutcome {
  branch: string;
  action: 'created' | 'updated' | 'up-to-date';
  from: string | null;
  to: string;
  dryRun: boolean;
}

// ─── Propagation Tasks ─────────────────────────────────────────────

export type TaskStatus =
  | 'pending'
  | 'branch-ready'
  | 'replaying'
  | 'conflict'
  | 'replayed'
  | 'aborted'
  | 'existing'
  | 'published'
  | 'declined'
  | 'planned'
  | 'failed';

export type ConflictOutcome = 'resumed' | 'aborted';

export interface ConflictRecord {
  step: string;
  files: string[];
  outcome: ConflictOutcome;
}

export interface PropagationTask {
  readonly source: ChangeRequest;
  readonly target: string;
  readonly localBranch: string;
  status: TaskStatus;
  applied: string[];
  conflicts: ConflictRecord[];
  result?: ChangeRequestSummary;
  push?: PushReport;
  error?: Error;
}

export type ReplayPlan =
  | { kind: 'commits'; commits: readonly Commit[] }
  | { kind: 'patch'; path: string };

// ─── Completion ────────────────────────────────────────────────────

export interface CompletionReport {
  declared: string[];
  missing: string[];
  status: 'labeled' | 'already-labeled' | 'incomplete' | 'no-targets' | 'would-label';
}

export interface RunReport {
  source: ChangeRequest | null;
  status: 'completed' | 'already-propagated';
  sync: SyncOutcome[];
  tasks: PropagationTask[];
  completion: CompletionReport | null;
}
