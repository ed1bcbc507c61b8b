import path from 'path';

// Operating-system and sync-client litter that never belongs in an index or a plan.
const EXACT_NAMES = [
  '.DS_Store',
  '.localized',
  '.Spotlight-V100',
  '.Trashes',
  '.fseventsd',
  '.TemporaryItems',
  '.Trash',
  'Thumbs.db',
  'ehthumbs.db',
  'desktop.ini',
  '$RECYCLE.BIN',
  'System Volume Information',
  'lost+found',
  '.dropbox',
  '.dropbox.cache',
  '.dropbox.attr',
  '.tmp.drivedownload',
  '.tmp.driveupload',
  '.stfolder',
  '.stversions',
];

const PREFIX_PATTERNS = ['~$', '._', '.~lock.', '.icloud~', '.sync-conflict-'];
const SUFFIX_PATTERNS = ['.tmp', '.swp', '.swo', '.crdownload', '.part', '.partial', '.download'];

const LOWER_EXACT_NAMES = new Set(EXACT_NAMES.map((name) => name.toLowerCase()));

const matchesPrefixPattern = (value: string) => {
  const lowerValue = value.toLowerCase();
  return PREFIX_PATTERNS.some((pattern) => lowerValue.startsWith(pattern));
};

const matchesSuffixPattern = (value: string) => {
  const lowerValue = value.toLowerCase();
  return SUFFIX_PATTERNS.some((pattern) => lowerValue.endsWith(pattern));
};

export const normaliseRelativePath = (rootPath: string, entryPath: string) => {
  const relative = path.relative(rootPath, entryPath);
  return relative.split(path.sep).filter(Boolean).join('/') || '';
};

/**
 * `relativePath` uses `/` separators. Directories are only matched by exact
 * name; the prefix and suffix patterns apply to files.
 */
export const shouldIgnorePath = (relativePath: string, isDirectory: boolean): boolean => {
  if (!relativePath) {
    return false;
  }

  const segments = relativePath.split('/');
  return segments.some((segment, index) => {
    const isLast = index === segments.length - 1;
    if (LOWER_EXACT_NAMES.has(segment.toLowerCase())) {
      return true;
    }
    if (isLast && !isDirectory) {
      return matchesPrefixPattern(segment) || matchesSuffixPattern(segment);
    }
    return false;
  });
};
