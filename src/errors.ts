/**
 * Error taxonomy for a propagation run.
 *
 * Setup failures (config, repo validation, branch expansion, fork sync) abort the
 * whole run before anything is pushed. Replay and publish failures are recorded on
 * the task for one target branch and the run moves on to the next one.
 */
export class PropagationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Missing or invalid credentials, settings or options. */
export class ConfigError extends PropagationError {}

/** The working copy is not a clean clone of the expected fork. */
export class RepoValidationError extends PropagationError {}

/** Target patterns could not be turned into a non-empty branch set. */
export class BranchExpansionError extends PropagationError {}

export class UnknownBranchError extends BranchExpansionError {
  readonly branch: string;

  constructor(branch: string, repository: string) {
    super(`Branch ${branch} does not exist in upstream repository ${repository}`);
    this.branch = branch;
  }
}

/** Hosting API failure while mirroring upstream branches into the fork. */
export class SyncError extends PropagationError {}

/** A replay step stopped on a conflict and the operator aborted the branch. */
export class ReplayConflict extends PropagationError {
  readonly step: string;
  readonly files: readonly string[];

  constructor(branch: string, step: string, files: readonly string[]) {
    const where = files.length > 0 ? ` in ${files.join(', ')}` : '';
    super(`Replay of ${step.substring(0, 12)} onto ${branch} stopped on a conflict${where}`);
    this.step = step;
    this.files = files;
  }
}

/** Push or pull request creation failed for one branch. */
export class PublishError extends PropagationError {}

/** Transport-level hosting API failure (anything other than an expected 404). */
export class HostingApiError extends PropagationError {
  readonly status: number | null;

  constructor(message: string, status: number | null, options?: { cause?: unknown }) {
    super(message, options);
    this.status = status;
  }
}
