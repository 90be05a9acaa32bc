import crypto from 'crypto';
import fs from 'fs';
import path from 'path';
import { NewFileRecord } from '../store/types';

/** Hex SHA-256 of the file content, streamed so large files stay off the heap. */
export function fileSignature(filePath: string): Promise<string> {
  return new Promise((resolve, reject) => {
    const hash = crypto.createHash('sha256');
    fs.createReadStream(filePath)
      .on('error', reject)
      .on('data', (chunk) => hash.update(chunk))
      .on('end', () => resolve(hash.digest('hex')));
  });
}

export interface FileStat {
  size: number;
  lastModified: number;
}

export async function statFile(filePath: string): Promise<FileStat> {
  const stats = await fs.promises.stat(filePath);
  return { size: stats.size, lastModified: Math.floor(stats.mtimeMs) };
}

export async function pathExists(filePath: string): Promise<boolean> {
  try {
    await fs.promises.access(filePath);
    return true;
  } catch {
    return false;
  }
}

/**
 * Reads everything a new record needs. Returns null for anything that is
 * not a regular file (directories, sockets, ...).
 */
export async function createFileInfo(filePath: string): Promise<NewFileRecord | null> {
  const absolutePath = path.resolve(filePath);
  const stats = await fs.promises.stat(absolutePath);
  if (!stats.isFile()) {
    return null;
  }
  return {
    path: absolutePath,
    size: stats.size,
    lastModified: Math.floor(stats.mtimeMs),
    contentSignature: await fileSignature(absolutePath),
  };
}
