import { promises as fsPromises } from 'node:fs';
import { randomUUID } from 'node:crypto';
import path from 'node:path';

import { InvalidSnapshotError, type RegistrySnapshot } from '@lifeboard/core';

export interface SnapshotStore {
  readonly filePath: string;
  /**
   * Reads the committed snapshot, or returns `undefined` when none exists.
   */
  read(): Promise<unknown>;
  /**
   * Commits a snapshot atomically. Writes are applied in call order.
   */
  write(snapshot: RegistrySnapshot): Promise<void>;
  /**
   * Removes temp files left behind by interrupted writes.
   */
  cleanupStaleTempFiles(): Promise<void>;
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

function isMissingFile(error: unknown): boolean {
  return isErrnoException(error) && error.code === 'ENOENT';
}

export function createFileSnapshotStore(filePath: string): SnapshotStore {
  const directory = path.dirname(filePath);
  const tempPrefix = `.tmp-${path.basename(filePath)}-`;
  let pending: Promise<void> = Promise.resolve();

  async function safeUnlink(targetPath: string): Promise<void> {
    try {
      await fsPromises.unlink(targetPath);
    } catch (error) {
      if (isMissingFile(error)) {
        return;
      }
      console.warn(`[snapshot-store] could not remove ${targetPath}`, error);
    }
  }

  async function writeAtomically(snapshot: RegistrySnapshot): Promise<void> {
    const tempPath = path.join(directory, `${tempPrefix}${randomUUID()}`);
    try {
      await fsPromises.mkdir(directory, { recursive: true });
      await fsPromises.writeFile(tempPath, `${JSON.stringify(snapshot)}\n`, 'utf8');
      await fsPromises.rename(tempPath, filePath);
    } catch (error) {
      await safeUnlink(tempPath);
      throw error;
    }
  }

  return {
    filePath,

    async read() {
      let text: string;
      try {
        text = await fsPromises.readFile(filePath, 'utf8');
      } catch (error) {
        if (isMissingFile(error)) {
          return undefined;
        }
        throw error;
      }

      try {
        const parsed: unknown = JSON.parse(text);
        return parsed;
      } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        throw new InvalidSnapshotError(`Snapshot file ${filePath} is not JSON: ${reason}`);
      }
    },

    write(snapshot) {
      const next = pending.then(() => writeAtomically(snapshot));
      // A failed write rejects only its own caller; later writes still run.
      pending = next.catch(() => undefined);
      return next;
    },

    async cleanupStaleTempFiles() {
      let entries: string[];
      try {
        entries = await fsPromises.readdir(directory);
      } catch (error) {
        if (isMissingFile(error)) {
          return;
        }
        throw error;
      }

      for (const entry of entries) {
        if (entry.startsWith(tempPrefix)) {
          await safeUnlink(path.join(directory, entry));
        }
      }
    },
  };
}
