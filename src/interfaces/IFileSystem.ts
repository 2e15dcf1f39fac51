/**
 * @fileoverview Interface for file system operations abstraction.
 * 
 * Wraps the handful of file operations the engine performs on work
 * directories and status files, so tests can simulate failing disks.
 * 
 * @module interfaces/IFileSystem
 */

/**
 * Interface for file system operations.
 * 
 * @example
 * ```typescript
 * class StatusStore {
 *   constructor(private readonly fs: IFileSystem) {}
 *   
 *   save(filePath: string, record: TestRecord): void {
 *     this.fs.ensureDir(path.dirname(filePath));
 *     this.fs.writeFileSync(filePath, JSON.stringify(record));
 *   }
 * }
 * ```
 */
export interface IFileSystem {
  // ─── Sync Operations ───────────────────────────────────────────────────

  /**
   * Ensure a directory exists, creating it recursively if needed.
   * @param dirPath - Directory path to ensure
   */
  ensureDir(dirPath: string): void;

  /** Check if a path exists synchronously. */
  existsSync(filePath: string): boolean;

  /** Read a file as UTF-8 string (sync). */
  readFileSync(filePath: string): string;

  /** Write a UTF-8 string to a file (sync). */
  writeFileSync(filePath: string, content: string): void;

  /** Delete a file (sync). Missing files are ignored. */
  unlinkSync(filePath: string): void;

  /** Open a file for reading (`'r'`) or truncating write (`'w'`) and return its descriptor. */
  openSync(filePath: string, flags: 'r' | 'w'): number;

  /** Close a descriptor returned by {@link openSync}. */
  closeSync(fd: number): void;

  // ─── Async Operations ─────────────────────────────────────────────────

  /** Read a file as UTF-8 string (async). */
  readFileAsync(filePath: string): Promise<string>;

  /** Remove a file or directory recursively (async). */
  rmAsync(filePath: string, options?: { recursive?: boolean; force?: boolean }): Promise<void>;

  /** Create directories recursively (async). */
  mkdirAsync(dirPath: string, options?: { recursive?: boolean }): Promise<void>;

  /** Read directory entries (async). */
  readdirAsync(dirPath: string): Promise<string[]>;

  /** Copy a file or directory tree (async). */
  copyAsync(src: string, dest: string): Promise<void>;

  /** Check if a path exists (async). */
  existsAsync(filePath: string): Promise<boolean>;

  /** Get file stats, following symlinks (async). */
  statAsync(filePath: string): Promise<{ isDirectory(): boolean; isFile(): boolean }>;
}
