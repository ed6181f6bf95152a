import { readFileSync, existsSync } from 'node:fs';
import { join, dirname, resolve } from 'node:path';
import yaml from 'js-yaml';
import { ZodError } from 'zod';
import { RunOptionsSchema, SettingsSchema } from './schema.js';
import type { RunConfig, RunOptionsInput, Settings } from './schema.js';
import { SETTINGS_FILENAME } from './branding.js';
import { ConfigError } from '../errors.js';

/**
 * Loads the optional settings file.
 * Walks up from the working directory like git does for `.git`; a missing file yields defaults.
 */
export class SettingsLoader {
  private filePath: string | null;

  constructor(cwd: string = process.cwd(), filePath?: string) {
    this.filePath = filePath ?? SettingsLoader.find(cwd);
  }

  // ─── Discovery ─────────────────────────────────────────────────────

  static find(cwd: string): string | null {
    let dir = resolve(cwd);
    while (true) {
      const candidate = join(dir, SETTINGS_FILENAME);
      if (existsSync(candidate)) return candidate;
      const parent = dirname(dir);
      if (parent === dir) return null;
      dir = parent;
    }
  }

  // ─── Load ─────────────────────────────────────────────────────────

  load(): Settings {
    if (!this.filePath) return SettingsSchema.parse({});
    const raw = readFileSync(this.filePath, 'utf-8');
    return parseSettings(raw, this.filePath);
  }

  get path(): string | null {
    return this.filePath;
  }
}

/** Parse and validate settings YAML. Empty documents yield defaults. */
export function parseSettings(raw: string, source = SETTINGS_FILENAME): Settings {
  let parsed: unknown;
  try {
    parsed = yaml.load(raw) ?? {};
  } catch (err) {
    throw new ConfigError(`Could not parse ${source}: ${err instanceof Error ? err.message : String(err)}`, { cause: err });
  }
  const result = SettingsSchema.safeParse(parsed);
  if (!result.success) {
    throw new ConfigError(`Invalid settings in ${source}: ${formatZodError(result.error)}`);
  }
  return result.data;
}

/** Validate CLI options and freeze them together with the settings into one run configuration. */
export function buildRunConfig(input: RunOptionsInput, settings: Settings): RunConfig {
  const result = RunOptionsSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigError(`Invalid options: ${formatZodError(result.error)}`);
  }
  const opts = result.data;
  return Object.freeze({
    prNumber: opts.pr,
    branches: opts.branches ? Object.freeze([...opts.branches]) : undefined,
    dryRun: opts.dryRun,
    verbose: opts.verbose,
    interactive: opts.interactive,
    confirmCreate: settings.confirm_create && !opts.yes,
    repoPath: resolve(opts.cwd),
    settings: Object.freeze({ ...settings }),
  });
}

function formatZodError(error: ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}
