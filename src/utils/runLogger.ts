import { bold, cyan, dim, green, red, yellow } from 'colorette';
import { describeError } from '../common/errors';
import type { ReorganiseReport } from '../main/organiser/reorganise';
import type { SyncReport } from '../main/syncEngine';

const MAX_LISTED_ITEMS = 10;

const numberFormatter = new Intl.NumberFormat('en-US');

export const coerceBoolean = (value: unknown): boolean => {
  if (typeof value === 'boolean') return value;
  if (typeof value === 'number') return value !== 0;
  if (typeof value === 'string') {
    const normalised = value.trim().toLowerCase();
    return ['1', 'true', 't', 'yes', 'y', 'on'].includes(normalised);
  }
  return false;
};

export const isVerboseEnabled = () => coerceBoolean(process.env.TAGFOLD_LOG_VERBOSE);

const timestamp = () => dim(new Date().toISOString());

export const formatDuration = (durationMs: number) => `${(durationMs / 1000).toFixed(durationMs >= 10000 ? 1 : 2)} s`;

export const formatNumber = (value: number | undefined) =>
  typeof value === 'number' && Number.isFinite(value) ? numberFormatter.format(value) : '-';

const emit = (header: string, details: string[] = []) => {
  console.log(`${timestamp()} ${header}`);
  details.forEach((detail) => console.log(`   ${detail}`));
};

const emitError = (header: string, details: string[] = []) => {
  console.error(`${timestamp()} ${header}`);
  details.forEach((detail) => {
    detail.split('\n').forEach((line) => console.error(`   ${line}`));
  });
};

const listed = (items: string[]) => {
  const shown = items.slice(0, MAX_LISTED_ITEMS).map((item) => `  ${item}`);
  if (items.length > MAX_LISTED_ITEMS) {
    shown.push(`  … +${formatNumber(items.length - MAX_LISTED_ITEMS)} more`);
  }
  return shown;
};

export const logSyncSummary = (report: SyncReport) => {
  const warnings = report.issues.length + report.degraded.length + report.rejected.length;
  const header = `${cyan('[sync]')} ${warnings ? yellow('Finished with warnings') : green('Finished')} ${dim(report.rootPath)}`;
  const details = [
    `Added: ${formatNumber(report.counts.added)}, updated: ${formatNumber(report.counts.updated)}, removed: ${formatNumber(report.counts.removed)}, unchanged: ${formatNumber(report.counts.unchanged)}`,
    `Duration: ${formatDuration(report.durationMs)}`,
  ];
  if (warnings) {
    details.push(
      `Scan issues: ${formatNumber(report.issues.length)}, degraded: ${formatNumber(report.degraded.length)}, rejected batches: ${formatNumber(report.rejected.length)}`,
    );
  }
  if (isVerboseEnabled() && report.degraded.length) {
    details.push('Degraded files:', ...listed(report.degraded.map((item) => `${item.path} (${item.stage})`)));
  }
  emit(header, details);
};

export const logReorganiseSummary = (report: ReorganiseReport, durationMs: number) => {
  const { execution } = report;
  const label = execution.mode === 'preview' ? 'Preview ready' : 'Apply finished';
  const status = execution.aborted
    ? yellow('Apply not confirmed')
    : execution.failures.length
      ? yellow(`${label} with failures`)
      : green(label);
  const header = `${cyan('[organise]')} ${status} ${dim(report.rootPath)}`;
  const details = [
    `Clusters: ${formatNumber(report.clusters.length)}, protected zones: ${formatNumber(report.zones.length)}`,
    `Moved: ${formatNumber(execution.counts.moved)}, would move: ${formatNumber(execution.counts.confirmed)}, skipped: ${formatNumber(execution.counts.skipped)}, failed: ${formatNumber(execution.counts.failed)}`,
    `Duration: ${formatDuration(durationMs)}`,
  ];
  if (report.reindex?.error) {
    details.push(`Index not updated: ${report.reindex.error}`);
  }
  if (isVerboseEnabled()) {
    details.push(
      'Clusters:',
      ...listed(report.clusters.map((cluster) => `${bold(cluster.folderName)}: ${formatNumber(cluster.paths.length)} files`)),
    );
  }
  emit(header, details);
};

export const logRunError = (error: unknown, command: string) => {
  const header = `${red(`[${command}]`)} ${red('Run failed')}`;
  const details = [describeError(error)];
  if (isVerboseEnabled() && error instanceof Error && error.stack) {
    details.push(error.stack);
  }
  emitError(header, details);
};
