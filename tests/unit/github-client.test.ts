import { describe, it, expect } from 'vitest';
import { RequestError } from 'octokit';
import { lookup, parseGitHubRemote, request, slug } from '../../src/github/client.js';
import { HostingApiError } from '../../src/errors.js';

const requestError = (status: number, message: string) =>
  new RequestError(message, status, { request: { method: 'GET', url: 'https://api.github.com/repos/acme/widgets', headers: {} } });

describe('parseGitHubRemote', () => {
  it('parses https and ssh remotes', () => {
    expect(parseGitHubRemote('https://github.com/alice/widgets.git')).toEqual({ owner: 'alice', repo: 'widgets' });
    expect(parseGitHubRemote('https://github.com/alice/widgets')).toEqual({ owner: 'alice', repo: 'widgets' });
    expect(parseGitHubRemote('git@github.com:alice/widgets.git')).toEqual({ owner: 'alice', repo: 'widgets' });
    expect(parseGitHubRemote('ssh://git@github.com/alice/eve.kernel.git\n')).toEqual({ owner: 'alice', repo: 'eve.kernel' });
  });

  it('rejects other hosts', () => {
    expect(parseGitHubRemote('https://gitlab.com/alice/widgets.git')).toBeNull();
  });
});

describe('lookup', () => {
  it('wraps a value', async () => {
    expect(await lookup('get branch', async () => 'sha')).toEqual({ found: true, value: 'sha' });
  });

  it('reports a 404 as absence', async () => {
    const result = await lookup('get branch', async () => {
      throw requestError(404, 'Not Found');
    });
    expect(result).toEqual({ found: false });
  });

  it('raises other statuses as HostingApiError', async () => {
    const call = lookup('get branch release-1 of acme/widgets', async () => {
      throw requestError(500, 'Server Error');
    });
    await expect(call).rejects.toBeInstanceOf(HostingApiError);
    await expect(call).rejects.toMatchObject({
      status: 500,
      message: 'Failed to get branch release-1 of acme/widgets (500): Server Error',
    });
  });
});

describe('request', () => {
  it('treats a 404 as a failure', async () => {
    const call = request('list branches of acme/widgets', async () => {
      throw requestError(404, 'Not Found');
    });
    await expect(call).rejects.toMatchObject({ status: 404 });
  });

  it('wraps non-HTTP errors without a status', async () => {
    const call = request('set labels of #42', async () => {
      throw new Error('socket hang up');
    });
    await expect(call).rejects.toMatchObject({ status: null, message: 'Failed to set labels of #42: socket hang up' });
  });

  it('passes HostingApiError through unchanged', async () => {
    const original = new HostingApiError('PR #42 patch was not returned as text', null);
    await expect(request('get patch', async () => Promise.reject(original))).rejects.toBe(original);
  });
});

describe('slug', () => {
  it('joins owner and repo', () => {
    expect(slug({ owner: 'acme', repo: 'widgets' })).toBe('acme/widgets');
  });
});
