import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';

/**
 * Expand tilde (~) to home directory in file paths
 */
export function expandTilde(filePath: string, homeDir: string = os.homedir()): string {
  if (filePath.startsWith('~/') || filePath === '~') {
    return path.join(homeDir, filePath.slice(1));
  }
  return filePath;
}

/**
 * Write through a temporary sibling and rename it over the target,
 * so readers never see a truncated file
 */
export function writeFileAtomic(filePath: string, content: string | Buffer): void {
  const tempPath = path.join(path.dirname(filePath), `.${path.basename(filePath)}.${process.pid}.tmp`);
  try {
    fs.writeFileSync(tempPath, content);
    fs.renameSync(tempPath, filePath);
  } catch (error) {
    fs.rmSync(tempPath, { force: true });
    throw error;
  }
}

/**
 * True when something (including a dangling symlink) occupies the path
 */
export function pathOccupied(filePath: string): boolean {
  try {
    fs.lstatSync(filePath);
    return true;
  } catch {
    return false;
  }
}

/**
 * Remove a file, symlink or directory tree without following links
 */
export function removePath(filePath: string): void {
  if (!pathOccupied(filePath)) {
    return;
  }
  const stats = fs.lstatSync(filePath);
  if (stats.isDirectory()) {
    fs.rmSync(filePath, { recursive: true, force: true });
  } else {
    fs.unlinkSync(filePath);
  }
}

export function fileSize(filePath: string): number {
  try {
    return fs.statSync(filePath).size;
  } catch {
    return 0;
  }
}

export function isDirectoryWritable(dirPath: string): boolean {
  try {
    if (!fs.statSync(dirPath).isDirectory()) {
      return false;
    }
    fs.accessSync(dirPath, fs.constants.W_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Whether linkPath is a symlink resolving to target
 */
export function isSymlinkTo(linkPath: string, target: string): boolean {
  try {
    if (!fs.lstatSync(linkPath).isSymbolicLink()) {
      return false;
    }
    return path.resolve(path.dirname(linkPath), fs.readlinkSync(linkPath)) === path.resolve(target);
  } catch {
    return false;
  }
}

/**
 * Convert a Linux path to the Wine drive path ReShade sees.
 * Wine maps the home directory to X:, anything else is addressed from X: as well.
 */
export function toWinePath(linuxPath: string, homeDir: string = os.homedir()): string {
  const home = homeDir.replace(/\/+$/, '');
  const relative = linuxPath === home || linuxPath.startsWith(`${home}/`) ? linuxPath.slice(home.length) : linuxPath;
  return `X:${relative.replace(/\//g, '\\')}`;
}
