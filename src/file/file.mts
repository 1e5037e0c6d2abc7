// @author lockerdb contributors
// @date 2026-10-19
import * as fsPromises from 'node:fs/promises';

/**
 * Whole-file I/O used by the record store.
 * Implementations may be the real disk or an in-memory file system for tests.
 *
 * Missing paths are reported with Node-style errors carrying `code: 'ENOENT'`.
 */
export interface FileSystem {
  /**
   * Reads the complete contents of a file.
   * @throws {Error} With code ENOENT if the file does not exist.
   */
  readFile(filePath: string): Promise<Buffer>;

  /**
   * Creates or truncates a file and writes `data` to it.
   * @param {number} mode - Permission bits applied when the file is created.
   */
  writeFile(filePath: string, data: Buffer | string, mode: number): Promise<void>;

  /**
   * Moves `from` over `to`, replacing it.
   */
  rename(from: string, to: string): Promise<void>;

  /**
   * Removes a file.
   * @throws {Error} With code ENOENT if the file does not exist.
   */
  remove(filePath: string): Promise<void>;

  /**
   * Checks whether a file or directory exists.
   */
  exists(filePath: string): Promise<boolean>;

  /**
   * Creates a directory and any missing parents. Existing directories are left alone.
   */
  mkdir(dirPath: string, mode: number): Promise<void>;

  /**
   * Changes the permission bits of a file or directory.
   */
  chmod(targetPath: string, mode: number): Promise<void>;

  /**
   * Lists the entries of a directory.
   * @throws {Error} With code ENOENT if the directory does not exist.
   */
  readdir(dirPath: string): Promise<DirEntry[]>;
}

export interface DirEntry {
  name: string;
  isDirectory: boolean;
}

/**
 * Real file system implementation using Node.js fs/promises.
 */
export class RealFileSystem implements FileSystem {
  public async readFile(filePath: string): Promise<Buffer> {
    return fsPromises.readFile(filePath);
  }

  public async writeFile(filePath: string, data: Buffer | string, mode: number): Promise<void> {
    await fsPromises.writeFile(filePath, data, { mode });
  }

  public async rename(from: string, to: string): Promise<void> {
    await fsPromises.rename(from, to);
  }

  public async remove(filePath: string): Promise<void> {
    await fsPromises.rm(filePath);
  }

  public async exists(filePath: string): Promise<boolean> {
    try {
      await fsPromises.access(filePath);
      return true;
    } catch {
      return false;
    }
  }

  public async mkdir(dirPath: string, mode: number): Promise<void> {
    await fsPromises.mkdir(dirPath, { recursive: true, mode });
  }

  public async chmod(targetPath: string, mode: number): Promise<void> {
    await fsPromises.chmod(targetPath, mode);
  }

  public async readdir(dirPath: string): Promise<DirEntry[]> {
    const entries = await fsPromises.readdir(dirPath, { withFileTypes: true });
    return entries.map((entry) => ({ name: entry.name, isDirectory: entry.isDirectory() }));
  }
}
