import path from 'path';
import type { FileRecord } from '../../common/fileTypes';
import { compareStrings, isWithin } from '../../common/paths';
import type { ProtectionIndex } from '../../common/protectedZones';
import type { MovePlan, PlanEntry } from '../../types/plan';
import type { FolderNameGenerator } from './folderNames';
import type { Cluster } from './tagClusterer';

export interface NamedCluster extends Cluster {
  folderName: string;
}

export interface BuildMovePlanInput {
  rootPath: string;
  records: readonly FileRecord[];
  clusters: readonly NamedCluster[];
  protection: ProtectionIndex;
  /** Directories that already exist; they are left out of `folders` */
  existingDirectories?: readonly string[];
  now?: () => Date;
}

/** Clusters must arrive in a stable order so names are reproducible. */
export const nameClusters = (clusters: readonly Cluster[], generator: FolderNameGenerator): NamedCluster[] =>
  clusters.map((cluster) => ({ ...cluster, folderName: generator.name(cluster) }));

// Case-folded so two names that only differ in case never share a slot.
const slotKey = (filePath: string) => filePath.toLowerCase();

const claimDestination = (target: string, occupied: Set<string>) => {
  if (!occupied.has(slotKey(target))) {
    return target;
  }
  const parsed = path.parse(target);
  for (let counter = 1; ; counter += 1) {
    const candidate = path.join(parsed.dir, `${parsed.name}_${counter}${parsed.ext}`);
    if (!occupied.has(slotKey(candidate))) {
      return candidate;
    }
  }
};

/**
 * One entry per scanned file. Protected files and files already in place are
 * skipped; everything else moves to `<root>/<folder>/<name>`, with `_<n>`
 * appended to the stem when that name is already held by another file.
 */
export const buildMovePlan = ({
  rootPath,
  records,
  clusters,
  protection,
  existingDirectories = [],
  now = () => new Date(),
}: BuildMovePlanInput): MovePlan => {
  const absoluteRoot = path.resolve(rootPath);
  const folderByPath = new Map<string, string>();
  clusters.forEach((cluster) => cluster.paths.forEach((filePath) => folderByPath.set(filePath, cluster.folderName)));

  const ordered = [...records].sort((a, b) => compareStrings(a.path, b.path));
  const occupied = new Set(ordered.map((record) => slotKey(record.path)));
  const existing = new Set(existingDirectories.map((directory) => path.resolve(directory)));
  const folders = new Set<string>();
  const entries: PlanEntry[] = [];

  ordered.forEach((record) => {
    if (protection.isProtected(record.path)) {
      entries.push({ sourcePath: record.path, destinationPath: record.path, status: { kind: 'skipped', reason: 'protected' } });
      return;
    }

    const folderName = folderByPath.get(record.path);
    if (!folderName) {
      entries.push({ sourcePath: record.path, destinationPath: record.path, status: { kind: 'skipped', reason: 'unclustered' } });
      return;
    }

    const folderPath = path.join(absoluteRoot, folderName);
    const target = path.join(folderPath, record.name);
    if (target === record.path) {
      entries.push({
        sourcePath: record.path,
        destinationPath: record.path,
        cluster: folderName,
        status: { kind: 'skipped', reason: 'no-op' },
      });
      return;
    }

    const destinationPath = claimDestination(target, occupied);
    if (!isWithin(absoluteRoot, destinationPath) || destinationPath === absoluteRoot) {
      throw new Error(`Refusing to plan a move of ${record.path} outside ${absoluteRoot}`);
    }
    if (protection.isProtected(destinationPath)) {
      throw new Error(`Refusing to plan a move of ${record.path} into protected ${destinationPath}`);
    }
    occupied.add(slotKey(destinationPath));
    if (!existing.has(folderPath)) {
      folders.add(folderPath);
    }
    entries.push({ sourcePath: record.path, destinationPath, cluster: folderName, status: { kind: 'planned' } });
  });

  return {
    rootPath: absoluteRoot,
    createdAtIso: now().toISOString(),
    entries,
    folders: [...folders].sort(compareStrings),
  };
};
