// @author lockerdb contributors
// @date 2026-10-19
import path from 'node:path';
import { InvalidNameError, StorageIOError, getErrorMessage } from './errors.mjs';
import { RealFileSystem, type FileSystem } from './file/file.mjs';

export const DATA_EXTENSION = '.txt';
export const KEY_EXTENSION = '.key';
export const DIRECTORY_MODE = 0o700;

export interface NamespaceOptions {
  /** Storage root; every schema is a directory directly below it. */
  rootDir: string;
  /** Schema used when a caller passes the empty name. The empty default means the root itself. */
  defaultSchema: string;
}

export interface CollectionPaths {
  dir: string;
  dataPath: string;
  keyPath: string;
}

const UNSAFE_NAME = /[/\\\0]/;

function assertSafeName(kind: 'schema' | 'collection', name: string): void {
  if (name === '' || name === '.' || name === '..' || UNSAFE_NAME.test(name)) {
    throw new InvalidNameError(`Invalid ${kind} name "${name}"`);
  }
}

/**
 * Maps (schema, collection) pairs to locations under the storage root and creates schema directories.
 */
export class Namespace {
  readonly rootDir: string;
  readonly defaultSchema: string;
  /** File system the store also uses for collection files. */
  readonly files: FileSystem;

  constructor(options: NamespaceOptions, files: FileSystem = new RealFileSystem()) {
    this.rootDir = path.resolve(options.rootDir);
    this.defaultSchema = options.defaultSchema;
    if (this.defaultSchema !== '') assertSafeName('schema', this.defaultSchema);
    this.files = files;
  }

  /**
   * Directory of a schema. The empty name selects the default schema.
   * @throws {InvalidNameError} If the name is not a single path segment.
   */
  schemaDir(schemaName: string): string {
    const name = schemaName === '' ? this.defaultSchema : schemaName;
    if (name === '') return this.rootDir;
    assertSafeName('schema', name);
    return path.join(this.rootDir, name);
  }

  collectionPaths(schemaName: string, collectionName: string): CollectionPaths {
    const dir = this.schemaDir(schemaName);
    assertSafeName('collection', collectionName);
    return {
      dir,
      dataPath: path.join(dir, `${collectionName}${DATA_EXTENSION}`),
      keyPath: path.join(dir, `${collectionName}${KEY_EXTENSION}`),
    };
  }

  /**
   * Creates the schema directory (and the root) if absent and restricts it to its owner.
   * Calling it on an existing directory only re-applies the permissions.
   *
   * @returns The schema directory.
   * @throws {StorageIOError} If the directory cannot be created or its permissions changed.
   */
  async ensureSchema(schemaName: string): Promise<string> {
    const dir = this.schemaDir(schemaName);
    try {
      await this.files.mkdir(dir, DIRECTORY_MODE);
    } catch (error) {
      throw new StorageIOError(`Failed to create schema directory ${dir}: ${getErrorMessage(error)}`, {
        cause: error,
      });
    }
    try {
      await this.files.chmod(dir, DIRECTORY_MODE);
    } catch (error) {
      throw new StorageIOError(`Failed to set permissions on ${dir}: ${getErrorMessage(error)}`, { cause: error });
    }
    return dir;
  }
}
