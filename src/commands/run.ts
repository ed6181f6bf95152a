import type { Command } from 'commander';
import { confirm } from '@inquirer/prompts';
import { SettingsLoader, buildRunConfig } from '../config/settings.js';
import { requireGitHubToken } from '../auth/token.js';
import { GitHubClient } from '../github/client.js';
import { GitOperations } from '../core/git-operations.js';
import { AbortingConflictResolver, InteractiveConflictResolver } from '../core/conflict-resolver.js';
import type { Confirm } from '../core/publisher.js';
import { Propagator } from '../core/propagator.js';
import { isSuccessful } from '../core/task.js';
import { createLogger, type Logger } from '../ui/logger.js';
import { RunSummary } from '../ui/report.js';
import { runCommand } from './handle.js';

interface RunCommandOptions {
  branches?: string;
  dryRun?: boolean;
  verbose?: boolean;
  token?: string;
  cwd?: string;
  yes?: boolean;
  interactive: boolean;
}

export function registerRun(program: Command): void {
  program
    .command('run', { isDefault: true })
    .description('Propagate a merged upstream pull request to its target branches')
    .argument('<pr>', 'Upstream pull request number')
    .option('-b, --branches <list>', 'Comma-separated target branches or patterns (overrides pr:<branch> labels)')
    .option('-d, --dry-run', 'Report what would happen without pushing or creating anything', false)
    .option('-v, --verbose', 'Verbose output', false)
    .option('-t, --token <token>', 'GitHub token (stored for later runs)')
    .option('-C, --cwd <path>', 'Local clone of the fork')
    .option('-y, --yes', 'Create pull requests without asking', false)
    .option('--no-interactive', 'Abort a branch on conflict instead of prompting')
    .action(async (pr: string, opts: RunCommandOptions) => {
      await runCommand(opts.verbose ?? false, async () => {
        const settings = new SettingsLoader(opts.cwd ?? process.cwd()).load();
        const config = buildRunConfig(
          {
            pr: Number(pr),
            branches: opts.branches,
            dryRun: opts.dryRun,
            verbose: opts.verbose,
            yes: opts.yes,
            interactive: opts.interactive,
            cwd: opts.cwd,
          },
          settings,
        );
        const logger = createLogger({ verbose: config.verbose });
        const { token, source } = await requireGitHubToken(opts.token);
        logger.debug(`GitHub token from ${source}`);

        const git = new GitOperations(config.repoPath);
        const report = await new Propagator({
          config,
          hosting: GitHubClient.create(token),
          git,
          resolver: config.interactive ? new InteractiveConflictResolver(git) : new AbortingConflictResolver(),
          confirm: config.interactive ? promptConfirm : declineWithoutPrompt(logger),
          logger,
        }).run();

        RunSummary.render(report, settings.labels.completed);
        if (!report.tasks.every(isSuccessful)) {
          process.exitCode = 1;
        }
      });
    });
}

const promptConfirm: Confirm = (message) => confirm({ message, default: false });

function declineWithoutPrompt(logger: Logger): Confirm {
  return async (message) => {
    logger.warn(`${message} Not asking without a terminal; pass --yes to create it`);
    return false;
  };
}
