import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

/** The subset of the Web Storage API that settings persistence relies on. */
export interface KeyValueStorage {
  getItem(key: string): string | null;
  setItem(key: string, value: string): void;
  removeItem(key: string): void;
}

export const DEFAULT_STORAGE_DIR = path.join(os.homedir(), 'aria');

export function createMemoryStorage(initial: Record<string, string> = {}): KeyValueStorage {
  const items = new Map(Object.entries(initial));
  return {
    getItem: (key) => items.get(key) ?? null,
    setItem: (key, value) => {
      items.set(key, value);
    },
    removeItem: (key) => {
      items.delete(key);
    },
  };
}

function keyToFile(dir: string, key: string): string {
  return path.join(dir, `${key.replace(/[^a-zA-Z0-9._-]/g, '_')}.json`);
}

/** One file per key under `dir`; the directory is created on first write. */
export function createFileStorage(dir: string = DEFAULT_STORAGE_DIR): KeyValueStorage {
  return {
    getItem(key) {
      const file = keyToFile(dir, key);
      if (!fs.existsSync(file)) {
        return null;
      }
      return fs.readFileSync(file, 'utf8');
    },
    setItem(key, value) {
      fs.mkdirSync(dir, { recursive: true });
      fs.writeFileSync(keyToFile(dir, key), value, { encoding: 'utf8', mode: 0o600 });
    },
    removeItem(key) {
      fs.rmSync(keyToFile(dir, key), { force: true });
    },
  };
}
