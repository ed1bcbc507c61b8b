import { stripDiacritics } from '../../common/text';
import type { Cluster } from './tagClusterer';

export type FolderSeparator = '-' | '_' | '.';

export interface FolderNameOptions {
  maxLength: number;
  separator: FolderSeparator;
  /** Name used for the fallback cluster */
  fallbackName: string;
  /** Names that must never be produced, e.g. protection markers */
  reservedNames?: Iterable<string>;
  /** Endings that must never be produced, e.g. bundle suffixes */
  reservedSuffixes?: Iterable<string>;
}

export const UNCATEGORIZED_FOLDER = 'uncategorized';

const WINDOWS_DEVICE_NAMES = [
  'con',
  'prn',
  'aux',
  'nul',
  ...Array.from({ length: 9 }, (_value, index) => `com${index + 1}`),
  ...Array.from({ length: 9 }, (_value, index) => `lpt${index + 1}`),
];

const escapeRegExp = (value: string) => value.replace(/[-\\^$*+?.()|[\]{}]/g, '\\$&');

const trimSeparators = (value: string, separator: FolderSeparator) => {
  const escaped = escapeRegExp(separator);
  return value.replace(new RegExp(`^(?:${escaped})+|(?:${escaped})+$`, 'g'), '');
};

/**
 * Lowercase ASCII letters and digits joined by single separators, at most
 * `maxLength` characters. May return '' when nothing usable remains.
 */
export const sanitiseFolderName = (value: string, separator: FolderSeparator, maxLength: number) => {
  const joined = stripDiacritics(value)
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, separator);
  return trimSeparators(trimSeparators(joined, separator).slice(0, maxLength), separator);
};

/**
 * Produces one folder name per cluster for a single planning pass. Names are
 * unique within the pass; a clash gets `<separator><n>` appended.
 */
export class FolderNameGenerator {
  private readonly options: FolderNameOptions;
  private readonly used = new Set<string>();
  private readonly reserved: Set<string>;
  private readonly reservedSuffixes: string[];

  constructor(options: FolderNameOptions) {
    this.options = options;
    this.reserved = new Set([...WINDOWS_DEVICE_NAMES, ...[...(options.reservedNames ?? [])].map((name) => name.toLowerCase())]);
    this.reservedSuffixes = [...(options.reservedSuffixes ?? [])].map((suffix) => suffix.toLowerCase());
  }

  name(cluster: Pick<Cluster, 'key' | 'fallback'>): string {
    const { separator, maxLength } = this.options;
    const source = cluster.fallback ? this.options.fallbackName : cluster.key;
    const base =
      sanitiseFolderName(source, separator, maxLength) ||
      sanitiseFolderName(this.options.fallbackName, separator, maxLength) ||
      UNCATEGORIZED_FOLDER;

    if (!this.isTaken(base)) {
      this.used.add(base);
      return base;
    }

    for (let counter = 1; ; counter += 1) {
      const suffix = `${separator}${counter}`;
      const stem = trimSeparators(base.slice(0, Math.max(1, maxLength - suffix.length)), separator);
      const candidate = `${stem}${suffix}`;
      if (!this.isTaken(candidate)) {
        this.used.add(candidate);
        return candidate;
      }
    }
  }

  private isTaken(name: string) {
    return this.used.has(name) || this.reserved.has(name) || this.reservedSuffixes.some((suffix) => name.endsWith(suffix));
  }
}
