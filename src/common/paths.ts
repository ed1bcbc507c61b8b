import path from 'path';

/** Code-unit ordering, independent of the host locale. */
export const compareStrings = (a: string, b: string) => {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
};

export const isWithin = (rootPath: string, candidate: string) => {
  const relative = path.relative(rootPath, candidate);
  return relative === '' || (relative !== '..' && !relative.startsWith(`..${path.sep}`) && !path.isAbsolute(relative));
};

/** Ancestors of `filePath` from its parent up to and including `rootPath`. */
export const ancestorsWithin = (rootPath: string, filePath: string): string[] => {
  const ancestors: string[] = [];
  let current = path.dirname(filePath);
  while (isWithin(rootPath, current)) {
    ancestors.push(current);
    if (current === rootPath) break;
    const parent = path.dirname(current);
    if (parent === current) break;
    current = parent;
  }
  return ancestors;
};

export const depthOf = (rootPath: string, target: string) =>
  path.relative(rootPath, target).split(path.sep).filter(Boolean).length;
