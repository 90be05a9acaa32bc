import fs from 'fs';
import path from 'path';
import Logger from '../logger/Logger';
import { createFileInfo, pathExists } from '../files/fileInfo';
import { RuleSet } from '../rules/types';
import { MetadataStore } from '../store/MetadataStore';
import { NewFileRecord } from '../store/types';
import { errorMessage } from '../utils/errors';

export interface ListingResult {
  files: NewFileRecord[];
  failures: Array<{ path: string; error: string }>;
}

/**
 * One-shot recursive walk of the given directories. Dotfiles are skipped to
 * match the watcher. Unreadable entries are reported, not thrown.
 */
export async function listDirectories(dirs: string[]): Promise<ListingResult> {
  const result: ListingResult = { files: [], failures: [] };
  const pending = dirs.map((dir) => path.resolve(dir));
  const seen = new Set<string>();

  while (pending.length > 0) {
    const dir = pending.pop();
    if (dir === undefined || seen.has(dir)) continue;
    seen.add(dir);

    let entries: fs.Dirent[];
    try {
      entries = await fs.promises.readdir(dir, { withFileTypes: true });
    } catch (error) {
      Logger.error('Cannot list directory', { path: dir, error: errorMessage(error) });
      result.failures.push({ path: dir, error: errorMessage(error) });
      continue;
    }

    for (const entry of entries) {
      if (entry.name.startsWith('.')) continue;
      const entryPath = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        pending.push(entryPath);
      } else if (entry.isFile()) {
        try {
          const info = await createFileInfo(entryPath);
          if (info) result.files.push(info);
        } catch (error) {
          Logger.warn('Cannot read file during listing', { path: entryPath, error: errorMessage(error) });
          result.failures.push({ path: entryPath, error: errorMessage(error) });
        }
      }
    }
  }

  Logger.info('Directory listing complete', {
    dirs,
    files: result.files.length,
    failures: result.failures.length,
  });
  return result;
}

/**
 * Feeds listed files into the store through the same add path the watcher
 * uses. Records left over from a previous run are replaced, then scored.
 */
export function registerListedFiles(
  store: MetadataStore,
  ruleSet: RuleSet,
  files: NewFileRecord[]
): { added: number; failed: number } {
  let added = 0;
  let failed = 0;
  for (const file of files) {
    try {
      store.add(file, { onConflict: 'replace' });
      const score = store.updateGrade(file.path, ruleSet);
      Logger.debug('TidyScore after all rules applied', { path: file.path, score });
      added++;
    } catch (error) {
      failed++;
      Logger.error('Failed to register listed file', { path: file.path, error: errorMessage(error) });
    }
  }
  return { added, failed };
}

function isWithin(dir: string, filePath: string): boolean {
  const relative = path.relative(dir, filePath);
  return relative.length > 0 && !relative.startsWith('..') && !path.isAbsolute(relative);
}

/**
 * Drops records under the listed directories whose files are gone, such as
 * files deleted while the agent was down. A record is only removed once the
 * path is confirmed absent on disk, so a walk that failed partway keeps its
 * records.
 */
export async function pruneVanishedFiles(
  store: MetadataStore,
  dirs: string[],
  listed: NewFileRecord[]
): Promise<{ pruned: number; failed: number }> {
  const roots = dirs.map((dir) => path.resolve(dir));
  const seen = new Set(listed.map((file) => file.path));
  let pruned = 0;
  let failed = 0;

  for (const record of store.listAll()) {
    if (seen.has(record.path) || !roots.some((root) => isWithin(root, record.path))) continue;
    if (await pathExists(record.path)) continue;
    try {
      store.remove(record.path);
      pruned++;
      Logger.info('Pruned record for vanished file', { path: record.path });
    } catch (error) {
      failed++;
      Logger.error('Failed to prune record', { path: record.path, error: errorMessage(error) });
    }
  }
  return { pruned, failed };
}
