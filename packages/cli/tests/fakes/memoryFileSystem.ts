import path from 'path';
import { vi } from 'vitest';
import type { IFileManager } from '../../src/domain/ports';

/**
 * IFileManager over a Map, with every method wrapped in vi.fn so tests can
 * both inspect the files and assert on (or override) individual calls.
 */
export function memoryFileSystem(initial: Record<string, string> = {}) {
  const files = new Map<string, string>(Object.entries(initial));

  const fs = {
    readFile: vi.fn(async (filePath: string) => {
      const content = files.get(filePath);
      if (content === undefined) throw new Error(`ENOENT: ${filePath}`);
      return content;
    }),
    writeFile: vi.fn(async (filePath: string, content: string) => {
      files.set(filePath, content);
    }),
    appendFile: vi.fn(async (filePath: string, content: string) => {
      files.set(filePath, (files.get(filePath) ?? '') + content);
    }),
    fileExists: vi.fn(async (filePath: string) =>
      files.has(filePath) || [...files.keys()].some(key => key.startsWith(`${filePath}/`))
    ),
    listFiles: vi.fn(async (dirPath: string) =>
      [...files.keys()]
        .filter(key => path.dirname(key) === dirPath)
        .map(key => path.basename(key))
    ),
    moveFile: vi.fn(async (fromPath: string, toPath: string) => {
      const content = files.get(fromPath);
      if (content === undefined) throw new Error(`ENOENT: ${fromPath}`);
      files.delete(fromPath);
      files.set(toPath, content);
    }),
    joinPaths: vi.fn((...parts: string[]) => path.join(...parts))
  } satisfies IFileManager;

  return { files, fs };
}
