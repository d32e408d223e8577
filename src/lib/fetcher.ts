import * as fs from 'fs';
import * as path from 'path';
import extract from 'extract-zip';
import { CommandRunner, ProcessCommandRunner } from './command-runner';
import { FetchError, toError } from '../installers/types';

/**
 * Brings remote artifacts into the cache directory. Both operations return
 * the local path holding the fetched content.
 */
export interface Fetcher {
  fetchRepository(url: string, destDir: string): Promise<string>;
  fetchArchive(url: string, destDir: string): Promise<string>;
}

export class GitArchiveFetcher implements Fetcher {
  constructor(private readonly runner: CommandRunner = new ProcessCommandRunner()) {}

  private async git(url: string, args: string[], cwd?: string): Promise<void> {
    const result = await this.runner.run('git', args, { cwd });
    if (result.exitCode !== 0) {
      const message = result.stderr.trim() || `exit code ${result.exitCode}`;
      throw new FetchError(`git ${args[0]} failed for ${url}: ${message}`, url);
    }
  }

  /**
   * Clone into destDir, or fast-forward an existing clone
   */
  async fetchRepository(url: string, destDir: string): Promise<string> {
    try {
      if (fs.existsSync(path.join(destDir, '.git'))) {
        console.log(`🔄 Updating ${path.basename(destDir)}...`);
        await this.git(url, ['pull', '--rebase'], destDir);
      } else {
        console.log(`⬇️  Cloning ${url}...`);
        fs.mkdirSync(path.dirname(destDir), { recursive: true });
        await this.git(url, ['clone', url, destDir]);
      }
    } catch (error) {
      throw error instanceof FetchError ? error : new FetchError(`Failed to fetch ${url}: ${toError(error).message}`, url, toError(error));
    }
    return destDir;
  }

  /**
   * Download a zip archive into destDir and extract it there
   */
  async fetchArchive(url: string, destDir: string): Promise<string> {
    const zipPath = path.join(destDir, path.basename(new URL(url).pathname) || 'archive.zip');

    try {
      fs.mkdirSync(destDir, { recursive: true });
      console.log(`⬇️  Downloading ${url}...`);
      const response = await fetch(url);
      if (!response.ok) {
        throw new FetchError(`Download of ${url} failed: HTTP ${response.status} ${response.statusText}`, url);
      }
      fs.writeFileSync(zipPath, Buffer.from(await response.arrayBuffer()));
      await extract(zipPath, { dir: path.resolve(destDir) });
    } catch (error) {
      throw error instanceof FetchError ? error : new FetchError(`Failed to fetch ${url}: ${toError(error).message}`, url, toError(error));
    }

    return destDir;
  }
}
