/**
 * File Store
 * File system implementation of IStore
 */

import type { Dirent } from "fs";
import fs from "fs/promises";
import path from "path";
import { keyFromName, normalizeKey, type IStore, type StoreOptions } from "./types.js";

function isMissing(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

export class FileStore implements IStore {
  private readonly basePath: string;
  private readonly prettyPrint: boolean;

  constructor(options: StoreOptions) {
    this.basePath = options.basePath;
    this.prettyPrint = options.prettyPrint ?? true;
  }

  getPath(key: string): string {
    return path.join(this.basePath, normalizeKey(key));
  }

  async read<T>(key: string): Promise<T | null> {
    try {
      const content = await fs.readFile(this.getPath(key), "utf-8");
      const parsed: T = JSON.parse(content);
      return parsed;
    } catch (error) {
      if (isMissing(error)) {
        return null;
      }
      throw error;
    }
  }

  async write<T>(key: string, data: T): Promise<void> {
    const filePath = this.getPath(key);
    await fs.mkdir(path.dirname(filePath), { recursive: true });

    const content = this.prettyPrint ? JSON.stringify(data, null, 2) : JSON.stringify(data);
    await fs.writeFile(filePath, content, "utf-8");
  }

  async exists(key: string): Promise<boolean> {
    try {
      await fs.access(this.getPath(key));
      return true;
    } catch (error) {
      if (isMissing(error)) return false;
      throw error;
    }
  }

  async delete(key: string): Promise<boolean> {
    try {
      await fs.unlink(this.getPath(key));
      return true;
    } catch (error) {
      if (isMissing(error)) return false;
      throw error;
    }
  }

  async list(pattern?: string): Promise<string[]> {
    const keys: string[] = [];

    const walk = async (dir: string): Promise<void> => {
      let entries: Dirent[];
      try {
        entries = await fs.readdir(dir, { withFileTypes: true });
      } catch (error) {
        if (isMissing(error)) return;
        throw error;
      }

      for (const entry of entries) {
        const fullPath = path.join(dir, entry.name);
        if (entry.isDirectory()) {
          await walk(fullPath);
        } else if (entry.isFile()) {
          const key = keyFromName(path.relative(this.basePath, fullPath).split(path.sep).join("/"));
          if (!pattern || key.includes(pattern)) {
            keys.push(key);
          }
        }
      }
    };

    await walk(this.basePath);
    return keys.sort();
  }
}

export function createFileStore(basePath: string, options?: Partial<StoreOptions>): IStore {
  return new FileStore({
    basePath,
    prettyPrint: options?.prettyPrint ?? true,
  });
}
