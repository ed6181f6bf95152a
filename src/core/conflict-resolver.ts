import { select, editor, confirm } from '@inquirer/prompts';
import chalk from 'chalk';
import { spawnSync } from 'node:child_process';
import type { ConflictFile, SequencerOperation } from './git-operations.js';

export interface ConflictContext {
  target: string;
  localBranch: string;
  operation: SequencerOperation;
  /** Commit hash being cherry-picked, or the patch file being applied. */
  step: string;
  /** Conflicted paths; empty when git stopped on an empty result. */
  files: string[];
  attempt: number;
}

export type ConflictDecision =
  | { kind: 'resumed'; resolvedFiles: string[] }
  | { kind: 'aborted' };

/** The human-in-the-loop step of a replay. The executor finishes or aborts the git operation itself. */
export interface ConflictResolutionStrategy {
  resolve(context: ConflictContext): Promise<ConflictDecision>;
}

/** Used with --no-interactive: every conflict aborts its branch. */
export class AbortingConflictResolver implements ConflictResolutionStrategy {
  async resolve(): Promise<ConflictDecision> {
    return { kind: 'aborted' };
  }
}

/** Working copy operations a person needs to settle conflicted files. */
export interface ConflictWorkspace {
  readonly path: string;
  getConflictedFiles(): Promise<ConflictFile[]>;
  readWorkingFile(filePath: string): string;
  resolveFile(filePath: string, content: string): Promise<void>;
  resolveUseOurs(filePath: string): Promise<void>;
  resolveUseTheirs(filePath: string): Promise<void>;
}

type FileAction = 'ours' | 'theirs' | 'manual' | 'view-full' | 'skip';
type SessionAction = 'retry' | 'shell' | 'resume' | 'abort';

/**
 * Interactive conflict resolution session.
 * Walks through each conflicted file and offers ours/theirs, manual edit or a shell
 * in the working copy, then asks whether replay should resume or the branch be abandoned.
 */
export class InteractiveConflictResolver implements ConflictResolutionStrategy {
  private git: ConflictWorkspace;
  private shell: string;

  constructor(git: ConflictWorkspace, shell: string = process.env.SHELL ?? '/bin/bash') {
    this.git = git;
    this.shell = shell;
  }

  async resolve(context: ConflictContext): Promise<ConflictDecision> {
    this.printHeader(context);
    const resolvedFiles: string[] = [];

    const files = await this.git.getConflictedFiles();
    for (let i = 0; i < files.length; i++) {
      const file = files[i];
      console.log(chalk.cyan(`─── File ${i + 1}/${files.length}: ${file.path} ───`));
      if (await this.resolveFile(file)) {
        resolvedFiles.push(file.path);
        console.log(chalk.green(`  ✓ Resolved: ${file.path}`));
      } else {
        console.log(chalk.red(`  ✗ Skipped: ${file.path}`));
      }
      console.log();
    }

    const allResolved = resolvedFiles.length === files.length;
    const action = await select<SessionAction>({
      message: allResolved ? 'Conflicts handled. How would you like to proceed?' : `${files.length - resolvedFiles.length} file(s) still unresolved. How would you like to proceed?`,
      choices: [
        ...(allResolved ? [{ name: 'Continue replaying', value: 'resume' as const }] : []),
        ...(files.length > 0 && !allResolved ? [{ name: 'Retry the remaining files', value: 'retry' as const }] : []),
        { name: `Open a shell in ${this.git.path}`, value: 'shell' as const },
        { name: `Abort ${context.target} (other branches continue)`, value: 'abort' as const },
      ],
    });

    switch (action) {
      case 'resume':
        return { kind: 'resumed', resolvedFiles };
      case 'retry':
        return this.resolve({ ...context, attempt: context.attempt + 1 });
      case 'shell':
        return this.resolveInShell(context);
      default:
        return { kind: 'aborted' };
    }
  }

  private async resolveInShell(context: ConflictContext): Promise<ConflictDecision> {
    console.log(chalk.dim(`  Resolve the conflict, stage the files and exit the shell to return.`));
    const result = spawnSync(this.shell, { cwd: this.git.path, stdio: 'inherit' });
    if (result.error) throw result.error;

    const resolved = await confirm({
      message: `Was ${context.operation} of ${context.step.substring(0, 12)} successful?`,
      default: false,
    });
    return resolved ? { kind: 'resumed', resolvedFiles: context.files } : { kind: 'aborted' };
  }

  // ─── Individual File Resolution ───────────────────────────────────

  private async resolveFile(file: ConflictFile): Promise<boolean> {
    this.showConflictPreview(file);
    const action = await select<FileAction>({
      message: `How to resolve ${chalk.bold(file.path)}?`,
      choices: [
        { name: '⬅️  Keep OURS (target branch version)', value: 'ours' },
        { name: '➡️  Keep THEIRS (picked commit version)', value: 'theirs' },
        { name: '✏️  Manual edit', value: 'manual' },
        { name: '👁️  View full conflict', value: 'view-full' },
        { name: '⏭️  Skip this file', value: 'skip' },
      ],
    });

    switch (action) {
      case 'ours':
        await this.git.resolveUseOurs(file.path);
        return true;
      case 'theirs':
        await this.git.resolveUseTheirs(file.path);
        return true;
      case 'manual':
        return this.manualEdit(file);
      case 'view-full':
        this.showFullConflict(file);
        return this.resolveFile(file);
      default:
        return false;
    }
  }

  // ─── UI Helpers ───────────────────────────────────────────────────

  private printHeader(context: ConflictContext): void {
    console.log(chalk.yellow('\n╔══════════════════════════════════════════════════════════════╗'));
    console.log(chalk.yellow('║  CONFLICT RESOLUTION                                         ║'));
    console.log(chalk.yellow('╚══════════════════════════════════════════════════════════════╝'));
    console.log(chalk.dim(`  Target:    ${context.target} (${context.localBranch})`));
    console.log(chalk.dim(`  Operation: ${context.operation} ${context.step}`));
    console.log(chalk.dim(`  Files:     ${context.files.length > 0 ? context.files.join(', ') : '(nothing conflicted, result is empty)'}`));
    if (context.attempt > 1) console.log(chalk.dim(`  Attempt:   ${context.attempt}`));
    console.log();
  }

  private showConflictPreview(file: ConflictFile): void {
    const maxLines = 8;
    const oursLines = file.oursContent.split('\n');
    const theirsLines = file.theirsContent.split('\n');

    console.log(chalk.red('  <<<< OURS (target branch):'));
    oursLines.slice(0, maxLines).forEach((l) => console.log(chalk.red(`    ${l}`)));
    if (oursLines.length > maxLines) console.log(chalk.dim(`    ... (${oursLines.length - maxLines} more lines)`));

    console.log(chalk.green('  >>>> THEIRS (picked commit):'));
    theirsLines.slice(0, maxLines).forEach((l) => console.log(chalk.green(`    ${l}`)));
    if (theirsLines.length > maxLines) console.log(chalk.dim(`    ... (${theirsLines.length - maxLines} more lines)`));
    console.log();
  }

  private showFullConflict(file: ConflictFile): void {
    console.log(chalk.red('\n════ OURS (full) ════'));
    console.log(file.oursContent);
    console.log(chalk.blue('\n════ BASE ════'));
    console.log(file.baseContent || chalk.dim('(no base available)'));
    console.log(chalk.green('\n════ THEIRS (full) ════'));
    console.log(file.theirsContent);
    console.log();
  }

  private async manualEdit(file: ConflictFile): Promise<boolean> {
    const content = await editor({
      message: `Edit ${file.path} (will open your $EDITOR):`,
      default: this.git.readWorkingFile(file.path),
    });
    if (!content.trim()) {
      console.log(chalk.yellow('  Empty content, skipping.'));
      return false;
    }
    await this.git.resolveFile(file.path, content);
    return true;
  }
}
