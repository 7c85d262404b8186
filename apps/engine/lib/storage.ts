import { mkdirSync, readFileSync, rmSync, writeFileSync } from 'fs';
import path from 'path';
import type { StateStorage } from 'zustand/middleware';

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Synchronous JSON-file storage for the persist middleware, one file per store name.
 * Being synchronous means a store is hydrated before its factory returns.
 */
export function createFileStateStorage(directory: string): StateStorage {
  const fileFor = (name: string) => path.join(directory, `${name}.json`);

  return {
    getItem(name) {
      try {
        return readFileSync(fileFor(name), 'utf8');
      } catch (error) {
        if (isMissingFile(error)) {
          return null;
        }
        throw error;
      }
    },
    setItem(name, value) {
      mkdirSync(directory, { recursive: true });
      writeFileSync(fileFor(name), value, 'utf8');
    },
    removeItem(name) {
      rmSync(fileFor(name), { force: true });
    },
  };
}

export function createMemoryStateStorage(): StateStorage {
  const items = new Map<string, string>();
  return {
    getItem: (name) => items.get(name) ?? null,
    setItem: (name, value) => {
      items.set(name, value);
    },
    removeItem: (name) => {
      items.delete(name);
    },
  };
}
