import path from 'path';
import type { ProtectedZone, ProtectionReason } from './fileTypes';
import { ancestorsWithin, compareStrings, depthOf, isWithin } from './paths';

export interface ProtectionMarkers {
  /** Version-control directories; the directory holding one is a repository root */
  vcsMarkers: readonly string[];
  /** Dependency and build-output directory names */
  dependencyMarkers: readonly string[];
  /** Directory name suffixes of macOS bundles and IDE packages */
  bundleSuffixes: readonly string[];
  /** File names (or `*` globs) that mark the containing directory as a project */
  projectConfigFiles: readonly string[];
}

export const DEFAULT_PROTECTION_MARKERS: ProtectionMarkers = {
  vcsMarkers: ['.git', '.hg', '.svn', '.bzr', 'CVS', '.fossil'],
  dependencyMarkers: [
    'node_modules',
    'bower_components',
    'target',
    '.gradle',
    '.mvn',
    'venv',
    '.venv',
    '__pycache__',
    '.pytest_cache',
    '.tox',
    '.mypy_cache',
    '.next',
    '.terraform',
    'Pods',
    'DerivedData',
  ],
  bundleSuffixes: ['.app', '.framework', '.plugin', '.bundle', '.kext', '.xcarchive', '.dSYM', '.xcodeproj', '.xcworkspace'],
  projectConfigFiles: [
    'package.json',
    'Cargo.toml',
    'go.mod',
    'pyproject.toml',
    'setup.py',
    'Pipfile',
    'pyvenv.cfg',
    'pom.xml',
    'build.gradle',
    'build.gradle.kts',
    'composer.json',
    'Gemfile',
    '*.csproj',
    '*.sln',
  ],
};

interface DirectoryListing {
  path: string;
  name: string;
  isRoot: boolean;
  childFiles: Set<string>;
  childDirectories: Set<string>;
}

interface CompiledMarkers {
  vcs: ReadonlySet<string>;
  dependency: ReadonlySet<string>;
  bundleSuffixes: readonly string[];
  projectConfig: readonly RegExp[];
}

interface ZoneRule {
  id: string;
  reason: ProtectionReason;
  /** Rules that look at the directory's own name never fire for the scan root */
  appliesToRoot: boolean;
  /** Returns the triggering marker name, or null */
  match: (listing: DirectoryListing, markers: CompiledMarkers) => string | null;
}

const globToRegExp = (pattern: string) => {
  const escaped = pattern
    .replace(/[-\\^$+?.()|[\]{}]/g, '\\$&')
    .replace(/\*/g, '.*')
    .replace(/\?/g, '.');
  return new RegExp(`^${escaped}$`, 'i');
};

const compileMarkers = (markers: ProtectionMarkers): CompiledMarkers => ({
  vcs: new Set(markers.vcsMarkers),
  dependency: new Set(markers.dependencyMarkers),
  bundleSuffixes: markers.bundleSuffixes.map((suffix) => suffix.toLowerCase()),
  projectConfig: markers.projectConfigFiles.map(globToRegExp),
});

const firstSorted = (values: Iterable<string>, predicate: (value: string) => boolean) =>
  [...values].sort(compareStrings).find(predicate) ?? null;

const ZONE_RULES: ZoneRule[] = [
  {
    id: 'vcs_directory',
    reason: 'vcs',
    appliesToRoot: false,
    match: (listing, markers) => (markers.vcs.has(listing.name) ? listing.name : null),
  },
  {
    id: 'dependency_directory',
    reason: 'dependency',
    appliesToRoot: false,
    match: (listing, markers) => (markers.dependency.has(listing.name) ? listing.name : null),
  },
  {
    id: 'bundle_directory',
    reason: 'bundle',
    appliesToRoot: false,
    match: (listing, markers) => {
      const lower = listing.name.toLowerCase();
      return markers.bundleSuffixes.some((suffix) => lower.endsWith(suffix) && lower !== suffix)
        ? listing.name
        : null;
    },
  },
  {
    id: 'repository_root',
    reason: 'vcs',
    appliesToRoot: true,
    // Worktrees and submodules carry `.git` as a file, so both kinds count.
    match: (listing, markers) =>
      firstSorted([...listing.childDirectories, ...listing.childFiles], (name) => markers.vcs.has(name)),
  },
  {
    id: 'project_config',
    reason: 'project-config',
    appliesToRoot: true,
    match: (listing, markers) =>
      firstSorted(listing.childFiles, (name) => markers.projectConfig.some((matcher) => matcher.test(name))),
  },
];

export interface DetectProtectedZonesInput {
  rootPath: string;
  filePaths: readonly string[];
  /** Directories seen by the walk, so empty marker directories still count */
  directoryPaths?: readonly string[];
  markers?: ProtectionMarkers;
}

const buildListings = (
  rootPath: string,
  filePaths: readonly string[],
  directoryPaths: readonly string[],
): Map<string, DirectoryListing> => {
  const listings = new Map<string, DirectoryListing>();

  const ensureDirectory = (directoryPath: string): DirectoryListing => {
    const existing = listings.get(directoryPath);
    if (existing) {
      return existing;
    }
    const isRoot = directoryPath === rootPath;
    const listing: DirectoryListing = {
      path: directoryPath,
      name: path.basename(directoryPath),
      isRoot,
      childFiles: new Set(),
      childDirectories: new Set(),
    };
    listings.set(directoryPath, listing);
    if (!isRoot) {
      ensureDirectory(path.dirname(directoryPath)).childDirectories.add(listing.name);
    }
    return listing;
  };

  ensureDirectory(rootPath);
  directoryPaths
    .map((directoryPath) => path.resolve(directoryPath))
    .filter((directoryPath) => isWithin(rootPath, directoryPath))
    .forEach((directoryPath) => ensureDirectory(directoryPath));
  filePaths
    .map((filePath) => path.resolve(filePath))
    .filter((filePath) => filePath !== rootPath && isWithin(rootPath, filePath))
    .forEach((filePath) => {
      ensureDirectory(path.dirname(filePath)).childFiles.add(path.basename(filePath));
    });

  return listings;
};

/**
 * Finds the shallowest directories that belong to a foreign project or
 * version-control tree. Directories below a zone are never evaluated again,
 * so a zone always covers its whole subtree.
 */
export const detectProtectedZones = ({
  rootPath,
  filePaths,
  directoryPaths = [],
  markers = DEFAULT_PROTECTION_MARKERS,
}: DetectProtectedZonesInput): ProtectedZone[] => {
  const absoluteRoot = path.resolve(rootPath);
  const compiled = compileMarkers(markers);
  const listings = [...buildListings(absoluteRoot, filePaths, directoryPaths).values()].sort(
    (a, b) => depthOf(absoluteRoot, a.path) - depthOf(absoluteRoot, b.path) || compareStrings(a.path, b.path),
  );

  const protectedDirectories = new Set<string>();
  const zones: ProtectedZone[] = [];

  for (const listing of listings) {
    if (!listing.isRoot && protectedDirectories.has(path.dirname(listing.path))) {
      protectedDirectories.add(listing.path);
      continue;
    }

    for (const rule of ZONE_RULES) {
      if (listing.isRoot && !rule.appliesToRoot) {
        continue;
      }
      const marker = rule.match(listing, compiled);
      if (marker) {
        zones.push({ path: listing.path, reason: rule.reason, marker });
        protectedDirectories.add(listing.path);
        break;
      }
    }
  }

  return zones.sort((a, b) => compareStrings(a.path, b.path));
};

export interface ProtectionIndex {
  rootPath: string;
  zones: readonly ProtectedZone[];
  zoneFor: (targetPath: string) => ProtectedZone | undefined;
  isProtected: (targetPath: string) => boolean;
}

export const createProtectionIndex = (rootPath: string, zones: readonly ProtectedZone[]): ProtectionIndex => {
  const absoluteRoot = path.resolve(rootPath);
  const byPath = new Map(zones.map((zone) => [zone.path, zone]));

  const zoneFor = (targetPath: string) => {
    const absoluteTarget = path.resolve(targetPath);
    const own = byPath.get(absoluteTarget);
    if (own) {
      return own;
    }
    for (const ancestor of ancestorsWithin(absoluteRoot, absoluteTarget)) {
      const zone = byPath.get(ancestor);
      if (zone) {
        return zone;
      }
    }
    return undefined;
  };

  return {
    rootPath: absoluteRoot,
    zones,
    zoneFor,
    isProtected: (targetPath) => zoneFor(targetPath) !== undefined,
  };
};

export const describeZone = (zone: ProtectedZone) => {
  switch (zone.reason) {
    case 'vcs':
      return `version-control tree (${zone.marker})`;
    case 'dependency':
      return `dependency or build folder (${zone.marker})`;
    case 'bundle':
      return `application bundle (${zone.marker})`;
    case 'project-config':
      return `project root (${zone.marker})`;
    default: {
      const exhaustive: never = zone.reason;
      throw new Error(`Unsupported protection reason ${String(exhaustive)}`);
    }
  }
};
