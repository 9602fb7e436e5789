import fs from 'fs/promises';
import { existsSync } from 'fs';
import path from 'path';
import log from 'electron-log/node';
import type { SubtitleLine } from '../../shared/types/app.js';
import { buildSrt, parseSrt } from '../../shared/helpers/index.js';
import { FILE_SUFFIXES } from '../../shared/constants/index.js';
import { errorMessage } from '../errors.js';

export class FileManagerError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'FileManagerError';
  }
}

export class FileManager {
  readonly tempDir: string;

  constructor(tempDir: string) {
    this.tempDir = path.resolve(tempDir);
  }

  async ensureTempDir(): Promise<void> {
    try {
      await fs.mkdir(this.tempDir, { recursive: true });
    } catch (error) {
      throw new FileManagerError(
        `Failed to create temp directory: ${errorMessage(error)}`
      );
    }
  }

  async readSrt(filePath: string): Promise<SubtitleLine[]> {
    const content = await fs.readFile(filePath, 'utf8');
    return parseSrt(content);
  }

  async writeSrt(filePath: string, lines: SubtitleLine[]): Promise<string> {
    return this.writeText(filePath, buildSrt(lines));
  }

  async writeText(filePath: string, content: string): Promise<string> {
    try {
      await fs.writeFile(filePath, content, 'utf8');
    } catch (error) {
      throw new FileManagerError(
        `Error writing ${filePath}: ${errorMessage(error)}`
      );
    }
    log.info(`[file-manager] Wrote ${filePath}`);
    return filePath;
  }

  async move(from: string, to: string): Promise<void> {
    await fs.rename(from, to);
    log.info(`[file-manager] Renamed ${from} -> ${to}`);
  }

  async removeIfExists(filePath: string): Promise<void> {
    await fs.rm(filePath, { force: true });
  }

  exists(filePath: string): boolean {
    return existsSync(filePath);
  }

  /** Source videos in a directory, skipping backups and trimming leftovers. */
  async listSourceVideos(dir: string): Promise<string[]> {
    const entries = await fs.readdir(dir, { withFileTypes: true });
    return entries
      .filter(
        e =>
          e.isFile() &&
          e.name.toLowerCase().endsWith('.mp4') &&
          !e.name.endsWith(FILE_SUFFIXES.ORIGINAL_BACKUP) &&
          !e.name.endsWith(FILE_SUFFIXES.TRIMMED_VIDEO)
      )
      .map(e => path.join(dir, e.name))
      .sort();
  }
}
