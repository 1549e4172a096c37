/**
 * @journal-vault/crypto - Salt Stores
 *
 * Persistence boundary for the KDF salt.
 */

import { mkdir, readFile, rename, rm, stat, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { bytesToHex } from '../utils/encoding';
import { generateRandomBytes } from '../utils/random';

/**
 * Where the salt lives. Implementations report failures by throwing;
 * callers treat every failure as fatal.
 */
export interface SaltStore {
  /** Human-readable location, used in logs */
  readonly location: string;
  exists(): Promise<boolean>;
  read(): Promise<Uint8Array>;
  /** Persist the salt; either the whole salt is stored or nothing is */
  write(salt: Uint8Array): Promise<void>;
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err;
}

/**
 * Salt kept as raw bytes in a file.
 */
export class FileSaltStore implements SaltStore {
  constructor(readonly location: string) {}

  async exists(): Promise<boolean> {
    try {
      await stat(this.location);
      return true;
    } catch (err) {
      if (isErrnoException(err) && err.code === 'ENOENT') {
        return false;
      }
      throw err;
    }
  }

  async read(): Promise<Uint8Array> {
    const contents = await readFile(this.location);
    return new Uint8Array(contents);
  }

  /**
   * Writes a temporary sibling and renames it over the target, so a crash
   * never leaves a truncated salt behind.
   */
  async write(salt: Uint8Array): Promise<void> {
    await mkdir(dirname(this.location), { recursive: true });
    const tempPath = `${this.location}.${bytesToHex(generateRandomBytes(6))}.tmp`;
    try {
      await writeFile(tempPath, salt, { flag: 'wx', mode: 0o600 });
      await rename(tempPath, this.location);
    } catch (err) {
      await rm(tempPath, { force: true });
      throw err;
    }
  }
}

/**
 * Salt held by the caller, for embedders that persist it alongside their
 * own records.
 */
export class MemorySaltStore implements SaltStore {
  readonly location = 'memory';
  private salt: Uint8Array | null;

  constructor(initial?: Uint8Array) {
    this.salt = initial ? new Uint8Array(initial) : null;
  }

  async exists(): Promise<boolean> {
    return this.salt !== null;
  }

  async read(): Promise<Uint8Array> {
    if (!this.salt) {
      throw new Error('No salt stored');
    }
    return new Uint8Array(this.salt);
  }

  async write(salt: Uint8Array): Promise<void> {
    this.salt = new Uint8Array(salt);
  }
}
