import * as fs from 'fs';
import * as path from 'path';

export interface Prerequisite {
  command: string;
  installHints: string[];
}

export const PREREQUISITES: readonly Prerequisite[] = [
  { command: 'git', installHints: ['Install git with your distribution package manager'] },
  {
    command: 'winetricks',
    installHints: [
      'Arch: sudo pacman -S winetricks',
      'Ubuntu/Debian: sudo apt install winetricks',
      'Fedora: sudo dnf install winetricks',
    ],
  },
];

function isExecutableFile(filePath: string): boolean {
  try {
    if (!fs.statSync(filePath).isFile()) {
      return false;
    }
    fs.accessSync(filePath, fs.constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Resolve a command the way the shell would, using the PATH in env
 */
export function findOnPath(command: string, env: NodeJS.ProcessEnv = process.env): string | undefined {
  const dirs = (env.PATH ?? '').split(path.delimiter).filter(dir => dir.length > 0);
  return dirs.map(dir => path.join(dir, command)).find(isExecutableFile);
}

/**
 * Report every missing prerequisite; returns the missing command names
 */
export function checkPrerequisites(
  env: NodeJS.ProcessEnv = process.env,
  prerequisites: readonly Prerequisite[] = PREREQUISITES
): string[] {
  const missing = prerequisites.filter(({ command }) => findOnPath(command, env) === undefined);

  for (const { command, installHints } of missing) {
    console.error(`❌ \`${command}\` not found on your PATH`);
    for (const hint of installHints) {
      console.error(`   ${hint}`);
    }
  }

  return missing.map(({ command }) => command);
}
