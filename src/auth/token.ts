import { readFile, writeFile, mkdir } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { dirname } from 'node:path';
import { execSync } from 'node:child_process';
import { z } from 'zod';
import { APP_NAME, APP_AUTH_FILE, APP_CONFIG_DIR_DISPLAY } from '../config/branding.js';
import { ConfigError } from '../errors.js';

export const AuthCredentialsSchema = z.object({
  github_token: z.string().min(1),
});

export type AuthCredentials = z.infer<typeof AuthCredentialsSchema>;

export type TokenSourceName = 'option' | 'env:GITHUB_TOKEN' | 'env:GH_TOKEN' | 'auth.json' | 'gh-cli';

export interface TokenSource {
  token: string;
  source: TokenSourceName;
}

export interface TokenLookupOptions {
  env?: NodeJS.ProcessEnv;
  authFile?: string;
  /** Returns `gh auth token` output, or null when the GitHub CLI is unavailable. */
  ghAuthToken?: () => string | null;
}

// ─── Credential Storage ─────────────────────────────────────────────

/** Read auth.json. Null if it does not exist; a corrupt file is a ConfigError. */
export async function readAuthCredentials(authFile: string = APP_AUTH_FILE): Promise<AuthCredentials | null> {
  if (!existsSync(authFile)) return null;
  const raw = await readFile(authFile, 'utf-8');
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new ConfigError(`${authFile} is not valid JSON`, { cause: err });
  }
  const result = AuthCredentialsSchema.safeParse(parsed);
  if (!result.success) throw new ConfigError(`${authFile} has no github_token`);
  return result.data;
}

export async function writeAuthCredentials(creds: AuthCredentials, authFile: string = APP_AUTH_FILE): Promise<void> {
  await mkdir(dirname(authFile), { recursive: true });
  await writeFile(authFile, JSON.stringify(creds, null, 2), { encoding: 'utf-8', mode: 0o600 });
}

// ─── GitHub Token Resolution ────────────────────────────────────────
// Cascading lookup:
//   1. --token                     (also stored for later runs)
//   2. $GITHUB_TOKEN / $GH_TOKEN
//   3. auth.json
//   4. `gh auth token`

export async function resolveGitHubToken(explicit?: string, options: TokenLookupOptions = {}): Promise<TokenSource | null> {
  const env = options.env ?? process.env;
  const authFile = options.authFile ?? APP_AUTH_FILE;

  if (explicit) {
    await writeAuthCredentials({ github_token: explicit }, authFile);
    return { token: explicit, source: 'option' };
  }
  if (env.GITHUB_TOKEN) return { token: env.GITHUB_TOKEN, source: 'env:GITHUB_TOKEN' };
  if (env.GH_TOKEN) return { token: env.GH_TOKEN, source: 'env:GH_TOKEN' };

  const creds = await readAuthCredentials(authFile);
  if (creds) return { token: creds.github_token, source: 'auth.json' };

  const ghToken = (options.ghAuthToken ?? tryGhAuthToken)();
  if (ghToken) return { token: ghToken, source: 'gh-cli' };

  return null;
}

function tryGhAuthToken(): string | null {
  try {
    const token = execSync('gh auth token', { encoding: 'utf-8', timeout: 5000, stdio: ['pipe', 'pipe', 'pipe'] }).trim();
    return token.length > 0 ? token : null;
  } catch {
    // gh missing or not logged in
    return null;
  }
}

/** Resolve a token or throw a ConfigError listing what was tried. */
export async function requireGitHubToken(explicit?: string, options: TokenLookupOptions = {}): Promise<TokenSource> {
  const result = await resolveGitHubToken(explicit, options);
  if (result) return result;

  throw new ConfigError(
    [
      'Could not find a GitHub token. Tried:',
      '  1. --token',
      '  2. $GITHUB_TOKEN / $GH_TOKEN env vars',
      `  3. ${APP_CONFIG_DIR_DISPLAY}/auth.json`,
      '  4. gh auth token (GitHub CLI)',
      '',
      'To fix, do one of:',
      `  • ${APP_NAME} run <pr> --token <token>`,
      '  • gh auth login',
      '  • export GITHUB_TOKEN=<token>',
    ].join('\n'),
  );
}
