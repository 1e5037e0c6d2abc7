// @author lockerdb contributors
// @date 2026-10-19
import { EncryptionService } from './encryption-service.mjs';
import {
  AlreadyExistsError,
  NotFoundError,
  StorageIOError,
  getErrorMessage,
  isEnoentError,
} from './errors.mjs';
import {
  decodeRecords,
  encodeRecords,
  parseRecordInput,
  stampEdit,
  stampNew,
  type JsonObject,
  type JsonRecord,
  type RecordInput,
} from './record-codec.mjs';
import { DATA_EXTENSION, type CollectionPaths, type Namespace } from './namespace.mjs';
import { KeyedMutex } from './atomic-operations/mutex.mjs';
import { writeFileAtomic } from './atomic-operations/atomic-write.mjs';
import type { DirEntry, FileSystem } from './file/file.mjs';

export const FILE_MODE = 0o600;

/** Structured logger implementation passed into the store. */
export interface Logger {
  debug?: (msg: string, context?: Record<string, unknown>) => void;
  info?: (msg: string, context?: Record<string, unknown>) => void;
  warn?: (msg: string, context?: Record<string, unknown>) => void;
  error?: (msg: string, context?: Record<string, unknown>) => void;
}

export const consoleLogger: Logger = {
  warn: (msg, context) => console.warn(msg, context ?? {}),
  error: (msg, context) => console.error(msg, context ?? {}),
};

export interface CollectionStoreOptions {
  /** Source of `createdAt` / `updatedAt` (defaults to the system clock). */
  clock?: () => Date;
  /** Receives warnings about half-finished create and drop operations (defaults to console). */
  logger?: Logger;
  /**
   * Serialize every load-mutate-persist cycle per collection inside this process.
   * Off by default: concurrent mutations of one collection race and the last write wins.
   */
  lockCollections?: boolean;
  /**
   * Replace data files through a staging file and a rename instead of overwriting them in place.
   * Off by default.
   */
  atomicWrites?: boolean;
}

interface LoadedCollection {
  records: JsonObject[];
  key: Buffer;
}

/**
 * Encrypted single-file record store.
 *
 * Every operation is one full cycle over the whole collection: read the data and key files,
 * decrypt, decode, apply the change, encode, encrypt under the same key and overwrite the data file.
 * Nothing is cached between calls.
 *
 * The data file and the key file are written and removed separately. A failure between the two
 * steps of `create` or `drop` leaves one of them behind; this is reported, not repaired.
 */
export class CollectionStore {
  private readonly namespace: Namespace;
  private readonly files: FileSystem;
  private readonly clock: () => Date;
  private readonly log: Logger;
  private readonly locks: KeyedMutex | null;
  private readonly atomicWrites: boolean;

  constructor(namespace: Namespace, options: CollectionStoreOptions = {}) {
    this.namespace = namespace;
    this.files = namespace.files;
    this.clock = options.clock ?? (() => new Date());
    this.log = options.logger ?? consoleLogger;
    this.locks = options.lockCollections ? new KeyedMutex() : null;
    this.atomicWrites = options.atomicWrites ?? false;
  }

  /**
   * Creates a collection, empty or holding one record built from `input`.
   *
   * @returns The stored records.
   * @throws {AlreadyExistsError} If the data file is present.
   * @throws {InvalidEncodingError} If `input` is not a JSON object.
   * @throws {StorageIOError} If the schema directory or either file cannot be written.
   */
  async create(schemaName: string, collectionName: string, input?: RecordInput): Promise<JsonRecord[]> {
    const paths = this.namespace.collectionPaths(schemaName, collectionName);
    return this.exclusive(paths, async () => {
      await this.namespace.ensureSchema(schemaName);
      if (await this.files.exists(paths.dataPath)) {
        throw new AlreadyExistsError(`Collection ${collectionName} already exists in ${paths.dir}`);
      }
      const fields = input === undefined || input === '' ? undefined : parseRecordInput(input);
      return this.createFiles(paths, collectionName, fields);
    });
  }

  /**
   * Reads and decrypts a collection.
   *
   * @throws {NotFoundError} If the data file or the key file is missing.
   * @throws {StorageIOError} If a file cannot be read.
   * @throws {AuthenticationFailureError} If the key does not authenticate the data.
   * @throws {MalformedEnvelopeError} If the data file is truncated below one nonce or is not base64.
   * @throws {InvalidEncodingError} If the decrypted data is not a JSON array of objects.
   */
  async load(schemaName: string, collectionName: string): Promise<JsonObject[]> {
    const paths = this.namespace.collectionPaths(schemaName, collectionName);
    return this.exclusive(paths, async () => (await this.loadFiles(paths, collectionName)).records);
  }

  /**
   * Appends a record. A missing collection is created with the record as its first entry.
   *
   * @returns The stored record.
   */
  async insert(schemaName: string, collectionName: string, input: RecordInput): Promise<JsonRecord> {
    const paths = this.namespace.collectionPaths(schemaName, collectionName);
    const fields = parseRecordInput(input);
    return this.exclusive(paths, async () => {
      await this.namespace.ensureSchema(schemaName);
      if (!(await this.files.exists(paths.dataPath))) {
        const [created] = await this.createFiles(paths, collectionName, fields);
        return created;
      }

      const { records, key } = await this.loadFiles(paths, collectionName);
      const record = stampNew(fields, this.clock());
      await this.persist(paths, [...records, record], key);
      return record;
    });
  }

  /**
   * Replaces the non-reserved fields of the first record with `_id` equal to `id`, keeping its position.
   *
   * @returns The stored record.
   * @throws {NotFoundError} If no record matches; the collection is left untouched.
   */
  async update(schemaName: string, collectionName: string, id: string, input: RecordInput): Promise<JsonRecord> {
    const paths = this.namespace.collectionPaths(schemaName, collectionName);
    const fields = parseRecordInput(input);
    return this.exclusive(paths, async () => {
      const { records, key } = await this.loadFiles(paths, collectionName);
      const index = records.findIndex((record) => record['_id'] === id);
      if (index === -1) {
        throw new NotFoundError(`Record with _id ${id} not found in collection ${collectionName}`);
      }

      const edited = stampEdit(records[index], fields, this.clock());
      const next = [...records];
      next[index] = edited;
      await this.persist(paths, next, key);
      return edited;
    });
  }

  /**
   * Removes every record whose `_id` equals `id`.
   *
   * @returns The number of records removed.
   * @throws {NotFoundError} If no record matches; the collection is left untouched.
   */
  async delete(schemaName: string, collectionName: string, id: string): Promise<number> {
    const paths = this.namespace.collectionPaths(schemaName, collectionName);
    return this.exclusive(paths, async () => {
      const { records, key } = await this.loadFiles(paths, collectionName);
      const remaining = records.filter((record) => record['_id'] !== id);
      if (remaining.length === records.length) {
        throw new NotFoundError(`Record with _id ${id} not found in collection ${collectionName}`);
      }

      await this.persist(paths, remaining, key);
      return records.length - remaining.length;
    });
  }

  /**
   * Removes the data file, then the key file.
   *
   * @throws {NotFoundError} If the data file is absent.
   * @throws {StorageIOError} If either removal fails. When the key file removal fails the data file is already gone.
   */
  async drop(schemaName: string, collectionName: string): Promise<void> {
    const paths = this.namespace.collectionPaths(schemaName, collectionName);
    return this.exclusive(paths, async () => {
      if (!(await this.files.exists(paths.dataPath))) {
        throw new NotFoundError(`Collection ${collectionName} does not exist in ${paths.dir}`);
      }

      try {
        await this.files.remove(paths.dataPath);
      } catch (error) {
        throw new StorageIOError(`Failed to delete collection file: ${getErrorMessage(error)}`, { cause: error });
      }

      try {
        await this.files.remove(paths.keyPath);
      } catch (error) {
        this.log.warn?.('Collection data removed but key file left behind', {
          collection: collectionName,
          keyPath: paths.keyPath,
          error: getErrorMessage(error),
        });
        throw new StorageIOError(`Failed to delete key file: ${getErrorMessage(error)}`, { cause: error });
      }
    });
  }

  /** Creates a schema directory ahead of its first collection. */
  async ensureSchema(schemaName: string): Promise<string> {
    return this.namespace.ensureSchema(schemaName);
  }

  /**
   * Names of the collections in a schema, sorted.
   *
   * @throws {StorageIOError} If the schema directory cannot be read, including when it was never created.
   */
  async list(schemaName: string): Promise<string[]> {
    const dir = this.namespace.schemaDir(schemaName);
    let entries: DirEntry[];
    try {
      entries = await this.files.readdir(dir);
    } catch (error) {
      throw new StorageIOError(`Failed to read schema directory ${dir}: ${getErrorMessage(error)}`, { cause: error });
    }

    return entries
      .filter((entry) => !entry.isDirectory && entry.name.endsWith(DATA_EXTENSION))
      .map((entry) => entry.name.slice(0, -DATA_EXTENSION.length))
      .filter((name) => name !== '')
      .sort();
  }

  // =====================
  // Internals
  // =====================

  private async exclusive<T>(paths: CollectionPaths, fn: () => Promise<T>): Promise<T> {
    return this.locks ? this.locks.runExclusive(paths.dataPath, fn) : fn();
  }

  private async createFiles(
    paths: CollectionPaths,
    collectionName: string,
    fields: JsonObject | undefined,
  ): Promise<JsonRecord[]> {
    const key = EncryptionService.generateKey();
    const records = fields ? [stampNew(fields, this.clock())] : [];

    await this.persist(paths, records, key);

    try {
      await this.files.writeFile(paths.keyPath, key, FILE_MODE);
    } catch (error) {
      this.log.warn?.('Collection data written but key file missing', {
        collection: collectionName,
        dataPath: paths.dataPath,
        error: getErrorMessage(error),
      });
      throw new StorageIOError(`Failed to write key file: ${getErrorMessage(error)}`, { cause: error });
    }

    return records;
  }

  private async loadFiles(paths: CollectionPaths, collectionName: string): Promise<LoadedCollection> {
    const data = await this.readOrThrow(paths.dataPath, 'collection', () => {
      return new NotFoundError(`Collection ${collectionName} does not exist in ${paths.dir}`);
    });
    const key = await this.readOrThrow(paths.keyPath, 'key', () => {
      return new NotFoundError(`Key file for collection ${collectionName} is missing in ${paths.dir}`);
    });

    const plaintext = EncryptionService.fromBuffer(key).decrypt(data.toString('utf8'));
    return { records: decodeRecords(plaintext), key };
  }

  private async readOrThrow(filePath: string, what: string, notFound: () => Error): Promise<Buffer> {
    try {
      return await this.files.readFile(filePath);
    } catch (error) {
      if (isEnoentError(error)) throw notFound();
      throw new StorageIOError(`Failed to read ${what} file: ${getErrorMessage(error)}`, { cause: error });
    }
  }

  private async persist(paths: CollectionPaths, records: readonly JsonObject[], key: Buffer): Promise<void> {
    const envelope = EncryptionService.fromBuffer(key).encrypt(encodeRecords(records));
    try {
      if (this.atomicWrites) {
        await writeFileAtomic(this.files, paths.dataPath, envelope, FILE_MODE);
      } else {
        await this.files.writeFile(paths.dataPath, envelope, FILE_MODE);
      }
    } catch (error) {
      throw new StorageIOError(`Failed to write collection file: ${getErrorMessage(error)}`, { cause: error });
    }
    this.log.debug?.('Collection persisted', { dataPath: paths.dataPath, records: records.length });
  }
}
