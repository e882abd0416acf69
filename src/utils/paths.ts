import path from 'path';
import fs from 'fs';
import os from 'os';

// Walk up from this file until a package.json is found, so that paths do not
// depend on the directory the process was started from.
function findProjectRoot(startPath: string): string {
  let currentDir = startPath;
  while (currentDir !== path.parse(currentDir).root) {
    if (fs.existsSync(path.join(currentDir, 'package.json'))) {
      return currentDir;
    }
    currentDir = path.dirname(currentDir);
  }
  return process.cwd();
}

const PROJECT_ROOT = findProjectRoot(__dirname);

export function getProjectRoot(): string {
  return PROJECT_ROOT;
}

/**
 * Resolves a configured path. Absolute paths are kept, `~/` expands to the
 * home directory and anything else is taken relative to the project root.
 */
export function resolvePath(target: string): string {
  if (target === '~' || target.startsWith('~/')) {
    return path.join(os.homedir(), target.slice(1));
  }
  return path.isAbsolute(target) ? target : path.resolve(PROJECT_ROOT, target);
}
