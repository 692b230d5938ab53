import { mkdir, open, readFile, rename, unlink } from 'fs/promises';
import { join } from 'path';
import { PersistenceError, StoreLockedError, errorMessage } from '../types/index.js';
import { randomId } from '../utils/hash.js';
import { createChildLogger } from '../utils/logger.js';
import { ByteStore, Unlock } from './byte-store.js';

const logger = createChildLogger('file-store');

/**
 * Filesystem calls the store depends on, replaceable in tests
 */
export interface FileOperations {
  writeDurable(path: string, data: string): Promise<void>;
  rename(from: string, to: string): Promise<void>;
  syncDirectory(path: string): Promise<void>;
  unlink(path: string): Promise<void>;
}

async function writeDurable(path: string, data: string): Promise<void> {
  const handle = await open(path, 'w');
  try {
    await handle.writeFile(data, 'utf-8');
    await handle.sync();
  } finally {
    await handle.close();
  }
}

/**
 * Flush the directory entry so a completed rename survives power loss
 */
async function syncDirectory(path: string): Promise<void> {
  const handle = await open(path, 'r');
  try {
    await handle.sync();
  } finally {
    await handle.close();
  }
}

const defaultOperations: FileOperations = { writeDurable, rename, syncDirectory, unlink };

function hasCode(error: unknown, code: string): boolean {
  return error instanceof Error && 'code' in error && error.code === code;
}

function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    // EPERM: exists but belongs to another user
    return hasCode(error, 'EPERM');
  }
}

/**
 * One JSON file per key under a data directory. Writes go to a temp file
 * in the same directory, are fsynced, then renamed over the target.
 * The writer lock is a `<key>.lock` file holding the owner's pid.
 */
export class FileByteStore implements ByteStore {
  private readonly ops: FileOperations;

  constructor(
    private dataDir: string,
    ops: Partial<FileOperations> = {}
  ) {
    this.ops = { ...defaultOperations, ...ops };
  }

  pathFor(key: string, extension: string = 'json'): string {
    return join(this.dataDir, `${key.replace(/[^a-zA-Z0-9_-]/g, '_')}.${extension}`);
  }

  async get(key: string): Promise<string | null> {
    try {
      return await readFile(this.pathFor(key), 'utf-8');
    } catch (error) {
      if (hasCode(error, 'ENOENT')) {
        return null;
      }
      throw new PersistenceError(`Failed to read ${this.pathFor(key)}: ${errorMessage(error)}`, error);
    }
  }

  async put(key: string, value: string): Promise<void> {
    const target = this.pathFor(key);
    const temp = `${target}.${randomId(6)}.tmp`;

    try {
      await mkdir(this.dataDir, { recursive: true });
      await this.ops.writeDurable(temp, value);
      await this.ops.rename(temp, target);
      await this.ops.syncDirectory(this.dataDir);
    } catch (error) {
      await this.discard(temp);
      throw new PersistenceError(`Failed to write ${target}: ${errorMessage(error)}`, error);
    }
  }

  async delete(key: string): Promise<void> {
    try {
      await this.ops.unlink(this.pathFor(key));
    } catch (error) {
      if (!hasCode(error, 'ENOENT')) {
        throw new PersistenceError(`Failed to delete ${this.pathFor(key)}: ${errorMessage(error)}`, error);
      }
    }
  }

  /**
   * A lock left by a process that no longer exists is taken over
   */
  async lock(key: string): Promise<Unlock> {
    const path = this.pathFor(key, 'lock');
    try {
      await mkdir(this.dataDir, { recursive: true });
    } catch (error) {
      throw new PersistenceError(`Failed to create ${this.dataDir}: ${errorMessage(error)}`, error);
    }

    if (!(await this.createLockFile(path))) {
      const holder = await this.lockHolder(path);
      if (holder !== undefined) {
        if (holder === null || isProcessAlive(holder)) {
          throw new StoreLockedError(
            `Snapshot "${key}" is locked by another monitor process (pid ${holder ?? 'unknown'})`,
            { path, pid: holder }
          );
        }
        logger.warn({ path, pid: holder }, 'Removing stale lock');
        await this.discard(path);
      }
      if (!(await this.createLockFile(path))) {
        throw new StoreLockedError(`Snapshot "${key}" was locked by another monitor process`, { path });
      }
    }

    logger.debug({ path }, 'Writer lock taken');
    return () => this.discard(path);
  }

  /**
   * Returns false when the lock file already exists
   */
  private async createLockFile(path: string): Promise<boolean> {
    try {
      const handle = await open(path, 'wx');
      try {
        await handle.writeFile(String(process.pid), 'utf-8');
      } finally {
        await handle.close();
      }
      return true;
    } catch (error) {
      if (hasCode(error, 'EEXIST')) {
        return false;
      }
      throw new PersistenceError(`Failed to create lock ${path}: ${errorMessage(error)}`, error);
    }
  }

  /**
   * Pid recorded in the lock; null when unreadable, undefined when the file is gone
   */
  private async lockHolder(path: string): Promise<number | null | undefined> {
    try {
      const pid = parseInt((await readFile(path, 'utf-8')).trim(), 10);
      return Number.isInteger(pid) && pid > 0 ? pid : null;
    } catch (error) {
      if (hasCode(error, 'ENOENT')) {
        return undefined;
      }
      throw new PersistenceError(`Failed to read lock ${path}: ${errorMessage(error)}`, error);
    }
  }

  private async discard(path: string): Promise<void> {
    try {
      await this.ops.unlink(path);
    } catch (error) {
      if (!hasCode(error, 'ENOENT')) {
        logger.warn({ path, error: errorMessage(error) }, 'Could not remove file');
      }
    }
  }
}
