import type { ChangeRequest, LabelSettings } from '../config/schema.js';

/** Local (and fork) branch for one source request and target: `pr/<id>/<target>`. */
export function localBranchName(prefix: string, prNumber: number, target: string): string {
  return `${prefix}/${prNumber}/${target}`;
}

/** Targets declared through `pr:<branch>` labels, in label order, without duplicates. */
export function labelsToBranches(labels: readonly string[], settings: LabelSettings): string[] {
  const branches: string[] = [];
  for (const label of labels) {
    if (!label.startsWith(settings.target_prefix)) continue;
    const branch = label.slice(settings.target_prefix.length).trim();
    if (branch.length > 0 && !branches.includes(branch)) branches.push(branch);
  }
  return branches;
}

export function isPropagated(labels: readonly string[], settings: LabelSettings): boolean {
  return labels.includes(settings.completed);
}

export function shortBranchName(target: string, stripPrefix: string): string {
  return stripPrefix && target.startsWith(stripPrefix) && target.length > stripPrefix.length
    ? target.slice(stripPrefix.length)
    : target;
}

export function propagatedTitle(source: ChangeRequest, target: string, stripPrefix: string): string {
  return `[Merge PR#${source.number} -> ${shortBranchName(target, stripPrefix)}] ${source.title}`;
}

export function propagatedBody(source: ChangeRequest): string {
  return `Automated PR merge. See [PR#${source.number}](${source.url})`;
}
