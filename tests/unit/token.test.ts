import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { readAuthCredentials, requireGitHubToken, resolveGitHubToken } from '../../src/auth/token.js';
import { ConfigError } from '../../src/errors.js';

describe('GitHub token resolution', () => {
  let dir: string;
  let authFile: string;
  const noGh = () => null;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'token-test-'));
    authFile = join(dir, 'nested', 'auth.json');
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('uses and stores an explicit token', async () => {
    const result = await resolveGitHubToken('test-secret', { env: { GITHUB_TOKEN: 'env-token' }, authFile, ghAuthToken: noGh });
    expect(result).toEqual({ token: 'test-secret', source: 'option' });
    expect(await readAuthCredentials(authFile)).toEqual({ github_token: 'test-secret' });
  });

  it('prefers GITHUB_TOKEN over GH_TOKEN', async () => {
    const env = { GITHUB_TOKEN: 'test-github', GH_TOKEN: 'test-gh' };
    expect(await resolveGitHubToken(undefined, { env, authFile, ghAuthToken: noGh })).toEqual({
      token: 'test-github',
      source: 'env:GITHUB_TOKEN',
    });
    expect(await resolveGitHubToken(undefined, { env: { GH_TOKEN: 'test-gh' }, authFile, ghAuthToken: noGh })).toEqual({
      token: 'test-gh',
      source: 'env:GH_TOKEN',
    });
  });

  it('falls back to the stored token, then to the GitHub CLI', async () => {
    expect(await resolveGitHubToken(undefined, { env: {}, authFile, ghAuthToken: () => 'test-cli' })).toEqual({
      token: 'test-cli',
      source: 'gh-cli',
    });

    const stored = join(dir, 'auth.json');
    writeFileSync(stored, JSON.stringify({ github_token: 'test-stored' }));
    expect(await resolveGitHubToken(undefined, { env: {}, authFile: stored, ghAuthToken: () => 'test-cli' })).toEqual({
      token: 'test-stored',
      source: 'auth.json',
    });
  });

  it('fails with ConfigError when nothing is available', async () => {
    await expect(requireGitHubToken(undefined, { env: {}, authFile, ghAuthToken: noGh })).rejects.toThrow(ConfigError);
  });

  it('rejects a corrupt auth file', async () => {
    const stored = join(dir, 'auth.json');
    writeFileSync(stored, '{not json');
    await expect(readAuthCredentials(stored)).rejects.toThrow(`${stored} is not valid JSON`);
  });
});
