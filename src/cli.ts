import { Command } from 'commander';
import { APP_NAME, APP_VERSION } from './config/branding.js';
import { registerRun } from './commands/run.js';
import { registerStatus } from './commands/status.js';
import { registerConfig } from './commands/config.js';
import { reportError } from './commands/handle.js';

const program = new Command();

program
  .name(APP_NAME)
  .description('Propagate a merged pull request onto release branches, one new pull request per branch')
  .version(APP_VERSION);

registerRun(program);
registerStatus(program);
registerConfig(program);

program.parseAsync().catch((err: unknown) => reportError(err, false));
