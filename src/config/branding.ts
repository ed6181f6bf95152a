import { join } from 'node:path';
import { homedir } from 'node:os';

// ─── Root Brand Primitives ──────────────────────────────────────────

/** This tool's name (CLI command, config subdir, settings filename). */
export const APP_NAME = 'pr-propagate';

export const APP_VERSION = '0.1.0';

// ─── Derived Brand Constants ────────────────────────────────────────

/** Settings filename looked up from the working directory upwards. */
export const SETTINGS_FILENAME = `.${APP_NAME}.yaml`;

/** Environment variable for overriding the config root. */
export const ENV_CONFIG_OVERRIDE = 'PR_PROPAGATE_HOME';

/** Config directory: ~/.config/pr-propagate */
export const APP_CONFIG_DIR = process.env[ENV_CONFIG_OVERRIDE] ?? join(homedir(), '.config', APP_NAME);

/** Auth file: ~/.config/pr-propagate/auth.json */
export const APP_AUTH_FILE = join(APP_CONFIG_DIR, 'auth.json');

/** Human-readable config dir path for messages. */
export const APP_CONFIG_DIR_DISPLAY = `~/.config/${APP_NAME}`;
