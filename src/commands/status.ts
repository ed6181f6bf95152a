import type { Command } from 'commander';
import { SettingsLoader, buildRunConfig } from '../config/settings.js';
import { requireGitHubToken } from '../auth/token.js';
import { GitHubClient } from '../github/client.js';
import { GitOperations } from '../core/git-operations.js';
import { PullRequestPublisher } from '../core/publisher.js';
import { CompletionTracker } from '../core/completion-tracker.js';
import { fetchSource, resolveForkPair } from '../core/propagator.js';
import { createLogger } from '../ui/logger.js';
import { RunSummary } from '../ui/report.js';
import { runCommand } from './handle.js';

interface StatusCommandOptions {
  mark?: boolean;
  verbose?: boolean;
  token?: string;
  cwd?: string;
}

export function registerStatus(program: Command): void {
  program
    .command('status')
    .description('Show which declared target branches already have a pull request')
    .argument('<pr>', 'Upstream pull request number')
    .option('--mark', 'Add the completion label when every target is done', false)
    .option('-v, --verbose', 'Verbose output', false)
    .option('-t, --token <token>', 'GitHub token (stored for later runs)')
    .option('-C, --cwd <path>', 'Local clone of the fork')
    .action(async (pr: string, opts: StatusCommandOptions) => {
      await runCommand(opts.verbose ?? false, async () => {
        const settings = new SettingsLoader(opts.cwd ?? process.cwd()).load();
        const config = buildRunConfig({ pr: Number(pr), verbose: opts.verbose, cwd: opts.cwd }, settings);
        const logger = createLogger({ verbose: config.verbose });
        const { token } = await requireGitHubToken(opts.token);
        const hosting = GitHubClient.create(token);
        const git = new GitOperations(config.repoPath);

        const { fork, upstream } = await resolveForkPair(hosting, git, config, { requireClean: false });
        const source = await fetchSource(hosting, upstream, config.prNumber);
        const publisher = new PullRequestPublisher(hosting, git, logger, async () => false, {
          fork,
          upstream,
          forkRemote: settings.remotes.fork,
          titleStripPrefix: settings.title_strip_prefix,
          confirmCreate: true,
        });
        const tracker = new CompletionTracker(hosting, publisher, logger, {
          upstream,
          labels: settings.labels,
          branchPrefix: settings.local_branch_prefix,
        });

        const completion = await tracker.check(source, { apply: opts.mark ?? false, dryRun: false });
        RunSummary.renderStatus(source, completion, settings.labels.completed);
      });
    });
}
