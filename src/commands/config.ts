import type { Command } from 'commander';
import chalk from 'chalk';
import yaml from 'js-yaml';
import { SettingsLoader } from '../config/settings.js';
import { APP_AUTH_FILE } from '../config/branding.js';
import { resolveGitHubToken } from '../auth/token.js';
import { runCommand } from './handle.js';

export function registerConfig(program: Command): void {
  program
    .command('config')
    .description('Show the effective settings and where the GitHub token comes from')
    .option('-C, --cwd <path>', 'Directory to look up the settings file from')
    .action(async (opts: { cwd?: string }) => {
      await runCommand(false, async () => {
        const loader = new SettingsLoader(opts.cwd ?? process.cwd());
        const settings = loader.load();
        const token = await resolveGitHubToken();

        console.log(chalk.bold('\n  Current Settings:'));
        console.log(chalk.dim(`    Settings file:  ${loader.path ?? '(none, using defaults)'}`));
        console.log(chalk.dim(`    GitHub token:   ${token ? chalk.green(`✓ ${token.source}`) : chalk.red('✗ not found')}`));
        console.log(chalk.dim(`    Auth file:      ${APP_AUTH_FILE}\n`));
        for (const line of yaml.dump(settings).trimEnd().split('\n')) {
          console.log(`    ${line}`);
        }
        console.log();
      });
    });
}
