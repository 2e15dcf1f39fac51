/**
 * @fileoverview Default IFileSystem implementation using Node.js fs module.
 * 
 * Production implementation of the file system abstraction.
 * Work directory and status file I/O goes through this interface for testability.
 * 
 * @module core/defaultFileSystem
 */

import * as fs from 'fs';
import type { IFileSystem } from '../interfaces/IFileSystem';

/**
 * Default file system implementation backed by Node.js fs module.
 */
export class DefaultFileSystem implements IFileSystem {
  // ─── Sync Operations ───────────────────────────────────────────────────

  ensureDir(dirPath: string): void {
    if (!fs.existsSync(dirPath)) {
      fs.mkdirSync(dirPath, { recursive: true });
    }
  }

  existsSync(filePath: string): boolean {
    return fs.existsSync(filePath);
  }

  readFileSync(filePath: string): string {
    return fs.readFileSync(filePath, 'utf-8');
  }

  writeFileSync(filePath: string, content: string): void {
    fs.writeFileSync(filePath, content, 'utf-8');
  }

  unlinkSync(filePath: string): void {
    fs.rmSync(filePath, { force: true });
  }

  openSync(filePath: string, flags: 'r' | 'w'): number {
    return fs.openSync(filePath, flags);
  }

  closeSync(fd: number): void {
    fs.closeSync(fd);
  }

  // ─── Async Operations ─────────────────────────────────────────────────

  async readFileAsync(filePath: string): Promise<string> {
    return fs.promises.readFile(filePath, 'utf-8');
  }

  async rmAsync(filePath: string, options?: { recursive?: boolean; force?: boolean }): Promise<void> {
    await fs.promises.rm(filePath, options);
  }

  async mkdirAsync(dirPath: string, options?: { recursive?: boolean }): Promise<void> {
    await fs.promises.mkdir(dirPath, options);
  }

  async readdirAsync(dirPath: string): Promise<string[]> {
    return fs.promises.readdir(dirPath);
  }

  async copyAsync(src: string, dest: string): Promise<void> {
    await fs.promises.cp(src, dest, { recursive: true });
  }

  async existsAsync(filePath: string): Promise<boolean> {
    try {
      await fs.promises.access(filePath);
      return true;
    } catch {
      return false;
    }
  }

  async statAsync(filePath: string): Promise<fs.Stats> {
    return fs.promises.stat(filePath);
  }
}
