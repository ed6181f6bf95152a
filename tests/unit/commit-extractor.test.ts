import { describe, it, expect, beforeEach } from 'vitest';
import { CommitExtractor } from '../../src/core/commit-extractor.js';
import { RepoValidationError } from '../../src/errors.js';
import { FakeHosting, FakeWorkingCopy, UPSTREAM, makeChangeRequest } from './fakes.js';

describe('CommitExtractor', () => {
  let hosting: FakeHosting;
  let git: FakeWorkingCopy;
  let extractor: CommitExtractor;

  beforeEach(() => {
    hosting = new FakeHosting();
    git = new FakeWorkingCopy();
    git.objects.add('merge42');
    git.history.set('merge42', [
      { hash: 'c3', subject: 'third', author: 'Dev' },
      { hash: 'c2', subject: 'second', author: 'Dev' },
      { hash: 'c1', subject: 'first', author: 'Dev' },
      { hash: 'c0', subject: 'older', author: 'Dev' },
    ]);
    extractor = new CommitExtractor(hosting, git);
  });

  it('returns the N commits of the request, oldest first', async () => {
    const source = makeChangeRequest();
    hosting.addSource(source, ['c1', 'c2', 'c3']);

    const commits = await extractor.extract(UPSTREAM, source);
    expect(commits.map((c) => c.hash)).toEqual(['c1', 'c2', 'c3']);
  });

  it('is stable across calls', async () => {
    const source = makeChangeRequest();
    hosting.addSource(source, ['c1', 'c2', 'c3']);

    const first = (await extractor.extract(UPSTREAM, source)).map((c) => c.hash);
    const second = (await extractor.extract(UPSTREAM, source)).map((c) => c.hash);
    expect(second).toEqual(first);
  });

  it('returns nothing for an unmerged request', async () => {
    const source = makeChangeRequest({ merged: false, mergeCommitSha: null, state: 'open' });
    hosting.addSource(source, ['c1']);
    expect(await extractor.extract(UPSTREAM, source)).toEqual([]);
  });

  it('asks for a fetch when the merge commit is not local', async () => {
    const source = makeChangeRequest({ mergeCommitSha: 'missing' });
    hosting.addSource(source, ['c1']);
    await expect(extractor.extract(UPSTREAM, source)).rejects.toThrow(RepoValidationError);
    await expect(extractor.extract(UPSTREAM, source)).rejects.toThrow("Fetch 'upstream' first.");
  });
});
