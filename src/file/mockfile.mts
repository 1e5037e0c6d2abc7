// @author lockerdb contributors
// @date 2026-10-19
import path from 'node:path';
import type { DirEntry, FileSystem } from './file.mjs';

export type FileOperation = 'readFile' | 'writeFile' | 'rename' | 'remove' | 'mkdir' | 'chmod' | 'readdir';

type Node = { type: 'file'; data: Buffer; mode: number } | { type: 'dir'; mode: number };

interface Fault {
  operation: FileOperation;
  targetPath: string;
  code: string;
}

function fsError(code: string, operation: string, targetPath: string): NodeJS.ErrnoException {
  const error: NodeJS.ErrnoException = new Error(`${code}: ${operation} '${targetPath}'`);
  error.code = code;
  error.path = targetPath;
  return error;
}

/**
 * In-memory implementation of the FileSystem interface.
 * Used in tests to inspect stored bytes and to simulate failures of single operations.
 *
 * Invariant: the parent of every stored path is a directory node; `/` always exists.
 */
export class MockFileSystem implements FileSystem {
  private nodes = new Map<string, Node>([['/', { type: 'dir', mode: 0o755 }]]);

  private faults: Fault[] = [];

  /** Every successful mutating call, as `operation path`, in order. */
  public readonly mutations: string[] = [];

  // =====================
  // Test helpers
  // =====================

  /**
   * Makes every later `operation` on `targetPath` fail with the given error code until cleared.
   */
  public injectFault(operation: FileOperation, targetPath: string, code = 'EIO'): void {
    this.faults.push({ operation, targetPath: path.resolve(targetPath), code });
  }

  public clearFaults(): void {
    this.faults = [];
  }

  /**
   * Permission bits of a stored file or directory, or undefined if it does not exist.
   */
  public getMode(targetPath: string): number | undefined {
    return this.nodes.get(path.resolve(targetPath))?.mode;
  }

  /**
   * Stored bytes of a file, or undefined if there is no such file.
   */
  public peek(filePath: string): Buffer | undefined {
    const node = this.nodes.get(path.resolve(filePath));
    return node?.type === 'file' ? Buffer.from(node.data) : undefined;
  }

  // =====================
  // Guard helpers
  // =====================

  private checkFault(operation: FileOperation, targetPath: string): void {
    const fault = this.faults.find((f) => f.operation === operation && f.targetPath === targetPath);
    if (fault) throw fsError(fault.code, operation, targetPath);
  }

  private requireParentDir(operation: string, targetPath: string): void {
    const parent = this.nodes.get(path.dirname(targetPath));
    if (!parent) throw fsError('ENOENT', operation, targetPath);
    if (parent.type !== 'dir') throw fsError('ENOTDIR', operation, targetPath);
  }

  private requireFile(operation: string, targetPath: string): Buffer {
    const node = this.nodes.get(targetPath);
    if (!node) throw fsError('ENOENT', operation, targetPath);
    if (node.type !== 'file') throw fsError('EISDIR', operation, targetPath);
    return node.data;
  }

  // =====================
  // FileSystem interface
  // =====================

  public async readFile(filePath: string): Promise<Buffer> {
    const resolved = path.resolve(filePath);
    this.checkFault('readFile', resolved);
    return Buffer.from(this.requireFile('readFile', resolved));
  }

  public async writeFile(filePath: string, data: Buffer | string, mode: number): Promise<void> {
    const resolved = path.resolve(filePath);
    this.checkFault('writeFile', resolved);
    this.requireParentDir('writeFile', resolved);
    const existing = this.nodes.get(resolved);
    if (existing?.type === 'dir') throw fsError('EISDIR', 'writeFile', resolved);

    // Like node:fs, the mode only applies when the file is created.
    const bytes = typeof data === 'string' ? Buffer.from(data, 'utf8') : Buffer.from(data);
    this.nodes.set(resolved, { type: 'file', data: bytes, mode: existing ? existing.mode : mode });
    this.mutations.push(`writeFile ${resolved}`);
  }

  public async rename(from: string, to: string): Promise<void> {
    const source = path.resolve(from);
    const target = path.resolve(to);
    this.checkFault('rename', source);
    const data = this.requireFile('rename', source);
    this.requireParentDir('rename', target);

    const mode = this.nodes.get(source)?.mode ?? 0o644;
    this.nodes.delete(source);
    this.nodes.set(target, { type: 'file', data, mode });
    this.mutations.push(`rename ${source} ${target}`);
  }

  public async remove(filePath: string): Promise<void> {
    const resolved = path.resolve(filePath);
    this.checkFault('remove', resolved);
    this.requireFile('remove', resolved);
    this.nodes.delete(resolved);
    this.mutations.push(`remove ${resolved}`);
  }

  public async exists(filePath: string): Promise<boolean> {
    return this.nodes.has(path.resolve(filePath));
  }

  public async mkdir(dirPath: string, mode: number): Promise<void> {
    const resolved = path.resolve(dirPath);
    this.checkFault('mkdir', resolved);

    const missing: string[] = [];
    for (let current = resolved; !this.nodes.has(current); current = path.dirname(current)) {
      missing.unshift(current);
    }
    const deepestExisting = this.nodes.get(missing.length > 0 ? path.dirname(missing[0]) : resolved);
    if (deepestExisting?.type !== 'dir') throw fsError(missing.length > 0 ? 'ENOTDIR' : 'EEXIST', 'mkdir', resolved);

    for (const dir of missing) {
      this.nodes.set(dir, { type: 'dir', mode });
      this.mutations.push(`mkdir ${dir}`);
    }
  }

  public async chmod(targetPath: string, mode: number): Promise<void> {
    const resolved = path.resolve(targetPath);
    this.checkFault('chmod', resolved);
    const node = this.nodes.get(resolved);
    if (!node) throw fsError('ENOENT', 'chmod', resolved);
    node.mode = mode;
    this.mutations.push(`chmod ${resolved}`);
  }

  public async readdir(dirPath: string): Promise<DirEntry[]> {
    const resolved = path.resolve(dirPath);
    this.checkFault('readdir', resolved);
    const node = this.nodes.get(resolved);
    if (!node) throw fsError('ENOENT', 'readdir', resolved);
    if (node.type !== 'dir') throw fsError('ENOTDIR', 'readdir', resolved);

    const entries: DirEntry[] = [];
    for (const [entryPath, entry] of this.nodes) {
      if (entryPath !== resolved && path.dirname(entryPath) === resolved) {
        entries.push({ name: path.basename(entryPath), isDirectory: entry.type === 'dir' });
      }
    }
    return entries.sort((a, b) => a.name.localeCompare(b.name));
  }
}
