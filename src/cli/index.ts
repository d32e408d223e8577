#!/usr/bin/env node

import * as fs from 'fs';
import * as path from 'path';
import { Command } from 'commander';
import { runSetup, type SetupOptions } from './run-setup';
import { toError } from '../installers/types';

function readVersion(): string {
  const packageJson: unknown = JSON.parse(fs.readFileSync(path.join(__dirname, '..', '..', 'package.json'), 'utf-8'));
  if (typeof packageJson === 'object' && packageJson !== null && 'version' in packageJson && typeof packageJson.version === 'string') {
    return packageJson.version;
  }
  return '0.0.0';
}

export function createProgram(run: (options: SetupOptions) => Promise<number> = runSetup): Command {
  const program = new Command();

  program
    .name('ffxiv-reshade-setup')
    .description('Install ReShade and the GPosingway shader bundle into FFXIV under Wine or Proton')
    .version(readVersion())
    .option('-y, --yes', 'Skip the confirmation prompt')
    .option('--restore', 'Restore config files backed up by the most recent run and exit')
    .option('--reshade-version <version>', 'ReShade version to install')
    .option('--update', 'Pull cached repositories even when already downloaded')
    .action(async () => {
      process.exitCode = await run(program.opts<SetupOptions>());
    });

  return program;
}

if (require.main === module) {
  createProgram()
    .parseAsync(process.argv)
    .catch(error => {
      console.error(`❌ ${toError(error).message}`);
      process.exitCode = 1;
    });
}
