import path from 'path';
import { compareStrings } from '../../common/paths';
import type { ExecutionReport, MovePlan, PlanEntry, SkipReason } from '../../types/plan';
import type { SyncReport } from '../syncEngine';

const SKIP_ORDER: SkipReason[] = ['protected', 'no-op', 'unclustered', 'cancelled'];

const displayPath = (rootPath: string, target: string) => {
  const relative = path.relative(rootPath, target);
  return relative ? relative.split(path.sep).join('/') : '.';
};

const plural = (count: number, singular: string, pluralForm = `${singular}s`) =>
  `${count} ${count === 1 ? singular : pluralForm}`;

const isMove = (entry: PlanEntry) => entry.status.kind === 'planned' || entry.status.kind === 'confirmed';

const renderSkipped = (rootPath: string, entries: readonly PlanEntry[]) => {
  const lines: string[] = [];
  SKIP_ORDER.forEach((reason) => {
    const matching = entries.filter((entry) => entry.status.kind === 'skipped' && entry.status.reason === reason);
    if (matching.length === 0) return;
    lines.push(`  ${reason} (${matching.length}):`);
    matching.forEach((entry) => lines.push(`    - ${displayPath(rootPath, entry.sourcePath)}`));
  });
  return lines.length ? ['Skipped:', ...lines] : [];
};

/**
 * Text tree of what a plan would do. Pass the checked entries from a preview
 * run to show which moves would fail.
 */
export const renderPlanTree = (plan: MovePlan, entries: readonly PlanEntry[] = plan.entries): string => {
  const lines = [`Proposed changes under ${plan.rootPath}:`];

  const byFolder = new Map<string, PlanEntry[]>();
  entries.filter(isMove).forEach((entry) => {
    const folder = path.dirname(entry.destinationPath);
    byFolder.set(folder, [...(byFolder.get(folder) ?? []), entry]);
  });

  [...byFolder.keys()].sort(compareStrings).forEach((folder) => {
    lines.push(`📁 ${displayPath(plan.rootPath, folder)}/`);
    (byFolder.get(folder) ?? [])
      .sort((a, b) => compareStrings(a.destinationPath, b.destinationPath))
      .forEach((entry) => {
        lines.push(`   📄 ${path.basename(entry.destinationPath)} (from: ${displayPath(plan.rootPath, entry.sourcePath)})`);
      });
  });

  lines.push(...renderSkipped(plan.rootPath, entries));

  const failing: string[] = [];
  entries.forEach((entry) => {
    if (entry.status.kind === 'failed') {
      failing.push(`  - ${displayPath(plan.rootPath, entry.sourcePath)}: ${entry.status.reason}`);
    }
  });
  if (failing.length) {
    lines.push('Would fail:', ...failing);
  }

  const moves = entries.filter(isMove).length;
  lines.push(`Create ${plural(plan.folders.length, 'directory', 'directories')}, move ${plural(moves, 'file')}.`);
  return lines.join('\n');
};

export const renderExecutionReport = (report: ExecutionReport, rootPath: string): string => {
  if (report.aborted) {
    return 'Apply was not confirmed; nothing was moved.';
  }
  const { counts } = report;
  const lines =
    report.mode === 'preview'
      ? [`Would move ${counts.confirmed}, skipped ${counts.skipped}, would fail ${counts.failed}.`]
      : [`Moved ${counts.moved}, skipped ${counts.skipped}, failed ${counts.failed}.`];
  if (report.cancelled) {
    lines.push('Cancelled before every move ran; the remaining files were left in place.');
  }
  if (report.failures.length) {
    lines.push('Failed:');
    report.failures.forEach((failure) => {
      lines.push(
        `  - ${displayPath(rootPath, failure.sourcePath)} -> ${displayPath(rootPath, failure.destinationPath)}: ${failure.reason}`,
      );
    });
  }
  lines.push(...renderSkipped(rootPath, report.entries));
  return lines.join('\n');
};

export const renderSyncReport = (report: SyncReport): string => {
  const { counts } = report;
  const lines = [
    `Synced ${report.rootPath}: added ${counts.added}, updated ${counts.updated}, removed ${counts.removed}, unchanged ${counts.unchanged}.`,
  ];
  if (report.issues.length) {
    lines.push('Scan issues:');
    report.issues.forEach((issue) => lines.push(`  - ${displayPath(report.rootPath, issue.path)} (${issue.stage}): ${issue.message}`));
  }
  if (report.degraded.length) {
    lines.push('Degraded annotations:');
    report.degraded.forEach((item) => lines.push(`  - ${displayPath(report.rootPath, item.path)} (${item.stage}): ${item.reason}`));
  }
  if (report.rejected.length) {
    lines.push('Rejected by the index:');
    report.rejected.forEach((batch) => lines.push(`  - ${plural(batch.paths.length, 'document')}: ${batch.reason}`));
  }
  return lines.join('\n');
};
