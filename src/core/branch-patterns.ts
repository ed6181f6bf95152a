import { BranchExpansionError, UnknownBranchError } from '../errors.js';

const WILDCARD = '*';

export function isPattern(value: string): boolean {
  return value.includes(WILDCARD);
}

/**
 * Compile a branch glob to an anchored matcher.
 * Every regex metacharacter is escaped and `*` matches any sequence, slashes included
 * (e.g. `eve-kernel-*-v6.1.38-*`).
 */
export function globToRegExp(pattern: string): RegExp {
  const body = pattern
    .split(WILDCARD)
    .map((part) => part.replace(/[.*+?^${}()|[\]\\/-]/g, '\\$&'))
    .join('.*');
  return new RegExp(`^${body}$`);
}

/**
 * Expand literal names and `*` patterns against the upstream branch list.
 *
 * A literal that upstream lacks is an error; a pattern that matches nothing contributes nothing.
 * The result is deduplicated and keeps first-seen order: pattern order, then upstream listing order.
 */
export function resolveBranchPatterns(
  patterns: readonly string[],
  upstreamBranches: readonly string[],
  repository = 'upstream',
): Set<string> {
  const known = new Set(upstreamBranches);
  const resolved = new Set<string>();

  for (const pattern of patterns) {
    if (isPattern(pattern)) {
      const matcher = globToRegExp(pattern);
      for (const branch of upstreamBranches) {
        if (matcher.test(branch)) resolved.add(branch);
      }
    } else if (known.has(pattern)) {
      resolved.add(pattern);
    } else {
      throw new UnknownBranchError(pattern, repository);
    }
  }
  return resolved;
}

/**
 * Final target set for one source request: expanded patterns minus the request's own base branch.
 * Never empty.
 */
export function selectTargetBranches(
  patterns: readonly string[],
  upstreamBranches: readonly string[],
  baseBranch: string,
  repository = 'upstream',
): string[] {
  if (patterns.length === 0) {
    throw new BranchExpansionError('No target branches given: pass --branches or add pr:<branch> labels to the pull request');
  }
  const resolved = resolveBranchPatterns(patterns, upstreamBranches, repository);
  if (resolved.size === 0) {
    throw new BranchExpansionError(`No branches found in ${repository} matching ${patterns.join(', ')}`);
  }
  resolved.delete(baseBranch);
  if (resolved.size === 0) {
    throw new BranchExpansionError(`The only matching branch is ${baseBranch}, the pull request's own base branch`);
  }
  return [...resolved];
}
