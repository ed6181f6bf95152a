import { describe, it, expect } from 'vitest';
import { globToRegExp, isPattern, resolveBranchPatterns, selectTargetBranches } from '../../src/core/branch-patterns.js';
import { BranchExpansionError, UnknownBranchError } from '../../src/errors.js';

const UPSTREAM = ['main', 'release-1', 'release-2', 'hotfix-a', 'eve-kernel-amd64-v6.1.38-generic', 'feature/release-x'];

describe('globToRegExp', () => {
  it('anchors the pattern at both ends', () => {
    const re = globToRegExp('release-*');
    expect(re.test('release-1')).toBe(true);
    expect(re.test('old-release-1')).toBe(false);
    expect(re.test('feature/release-x')).toBe(false);
  });

  it('treats regex metacharacters literally', () => {
    const re = globToRegExp('v6.1.*');
    expect(re.test('v6.1.38')).toBe(true);
    expect(re.test('v6x1.38')).toBe(false);
  });

  it('lets * span slashes', () => {
    expect(globToRegExp('feature/*').test('feature/a/b')).toBe(true);
  });
});

describe('resolveBranchPatterns', () => {
  it('expands patterns in upstream order and keeps literals', () => {
    const resolved = resolveBranchPatterns(['release-*', 'hotfix-a'], UPSTREAM);
    expect([...resolved]).toEqual(['release-1', 'release-2', 'hotfix-a']);
  });

  it('matches infix wildcards', () => {
    const resolved = resolveBranchPatterns(['eve-kernel-*-v6.1.38-*'], UPSTREAM);
    expect([...resolved]).toEqual(['eve-kernel-amd64-v6.1.38-generic']);
  });

  it('deduplicates overlapping patterns', () => {
    const resolved = resolveBranchPatterns(['release-1', 'release-*'], UPSTREAM);
    expect([...resolved]).toEqual(['release-1', 'release-2']);
  });

  it('returns the same set when run twice', () => {
    const first = resolveBranchPatterns(['release-*'], UPSTREAM);
    const second = resolveBranchPatterns([...first], UPSTREAM);
    expect([...second]).toEqual([...first]);
  });

  it('contributes nothing for a pattern that matches nothing', () => {
    expect(resolveBranchPatterns(['stable-*'], UPSTREAM).size).toBe(0);
  });

  it('rejects a literal branch missing upstream', () => {
    expect(() => resolveBranchPatterns(['release-9'], UPSTREAM, 'acme/widgets')).toThrow(UnknownBranchError);
    expect(() => resolveBranchPatterns(['release-9'], UPSTREAM, 'acme/widgets')).toThrow(
      'Branch release-9 does not exist in upstream repository acme/widgets',
    );
  });
});

describe('selectTargetBranches', () => {
  it('drops the base branch of the source request', () => {
    expect(selectTargetBranches(['main', 'release-*'], UPSTREAM, 'main')).toEqual(['release-1', 'release-2']);
  });

  it('fails without any pattern', () => {
    expect(() => selectTargetBranches([], UPSTREAM, 'main')).toThrow(BranchExpansionError);
  });

  it('fails when nothing matches', () => {
    expect(() => selectTargetBranches(['stable-*'], UPSTREAM, 'main', 'acme/widgets')).toThrow(
      'No branches found in acme/widgets matching stable-*',
    );
  });

  it('fails when only the base branch is left', () => {
    expect(() => selectTargetBranches(['main'], UPSTREAM, 'main')).toThrow(BranchExpansionError);
  });
});

describe('isPattern', () => {
  it('detects wildcards', () => {
    expect(isPattern('release-*')).toBe(true);
    expect(isPattern('release-1')).toBe(false);
  });
});
