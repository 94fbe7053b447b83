/**
 * Supabase Store
 * IStore over a Supabase Storage bucket
 */

import { createClient, type SupabaseClient } from "@supabase/supabase-js";
import { ConfigError, ForesightError } from "@foresight/core";
import { keyFromName, normalizeKey, type IStore } from "./types.js";

interface StorageFailure {
  message: string;
}

/**
 * The slice of the storage bucket API this store uses
 */
export interface BucketClient {
  download(path: string): Promise<{ data: Blob | null; error: StorageFailure | null }>;
  upload(
    path: string,
    body: string,
    options: { contentType: string; upsert: boolean }
  ): Promise<{ error: StorageFailure | null }>;
  list(
    path?: string,
    options?: { limit?: number; search?: string }
  ): Promise<{ data: Array<{ name: string; id: string | null }> | null; error: StorageFailure | null }>;
  remove(paths: string[]): Promise<{ data: unknown[] | null; error: StorageFailure | null }>;
}

export interface SupabaseStoreOptions {
  bucket: BucketClient;
  bucketName: string;
  /** Object prefix inside the bucket */
  prefix?: string;
}

let supabaseInstance: SupabaseClient | null = null;

/**
 * Lazy-loaded singleton client
 */
export function getSupabase(url?: string, key?: string): SupabaseClient {
  if (!supabaseInstance) {
    if (!url || !key) {
      throw new ConfigError(
        "Missing Supabase configuration. Set SUPABASE_URL and SUPABASE_KEY environment variables."
      );
    }

    supabaseInstance = createClient(url, key, {
      auth: {
        autoRefreshToken: false,
        persistSession: false,
      },
    });
  }

  return supabaseInstance;
}

/**
 * Reset client (for testing)
 */
export function resetSupabase(): void {
  supabaseInstance = null;
}

function storageError(action: string, path: string, error: StorageFailure): ForesightError {
  return new ForesightError(`Supabase storage ${action} failed for ${path}: ${error.message}`, "STORE_ERROR", {
    context: { path },
    retryable: true,
  });
}

function isNotFound(error: StorageFailure): boolean {
  const message = error.message.toLowerCase();
  return message.includes("not found") || message.includes("does not exist");
}

export class SupabaseStore implements IStore {
  private readonly bucket: BucketClient;
  private readonly bucketName: string;
  private readonly prefix: string;

  constructor(options: SupabaseStoreOptions) {
    this.bucket = options.bucket;
    this.bucketName = options.bucketName;
    this.prefix = (options.prefix ?? "").replace(/^\/+|\/+$/g, "");
  }

  private objectPath(key: string): string {
    const normalized = normalizeKey(key).replace(/^\/+/, "");
    return this.prefix ? `${this.prefix}/${normalized}` : normalized;
  }

  getPath(key: string): string {
    return `${this.bucketName}/${this.objectPath(key)}`;
  }

  async read<T>(key: string): Promise<T | null> {
    const objectPath = this.objectPath(key);
    const { data, error } = await this.bucket.download(objectPath);

    if (error) {
      if (isNotFound(error)) return null;
      throw storageError("download", objectPath, error);
    }
    if (!data) return null;

    const parsed: T = JSON.parse(await data.text());
    return parsed;
  }

  async write<T>(key: string, data: T): Promise<void> {
    const objectPath = this.objectPath(key);
    const { error } = await this.bucket.upload(objectPath, JSON.stringify(data, null, 2), {
      contentType: "application/json",
      upsert: true,
    });
    if (error) throw storageError("upload", objectPath, error);
  }

  async exists(key: string): Promise<boolean> {
    const objectPath = this.objectPath(key);
    const slash = objectPath.lastIndexOf("/");
    const dir = slash === -1 ? "" : objectPath.slice(0, slash);
    const name = objectPath.slice(slash + 1);

    const { data, error } = await this.bucket.list(dir, { search: name });
    if (error) throw storageError("list", dir, error);
    return (data ?? []).some((entry) => entry.name === name);
  }

  async delete(key: string): Promise<boolean> {
    const objectPath = this.objectPath(key);
    const { data, error } = await this.bucket.remove([objectPath]);
    if (error) throw storageError("remove", objectPath, error);
    return (data ?? []).length > 0;
  }

  async list(pattern?: string): Promise<string[]> {
    const keys: string[] = [];

    const walk = async (dir: string): Promise<void> => {
      const { data, error } = await this.bucket.list(dir, { limit: 1000 });
      if (error) throw storageError("list", dir, error);

      for (const entry of data ?? []) {
        const fullPath = dir ? `${dir}/${entry.name}` : entry.name;
        // Folders come back without an id
        if (!entry.id) {
          await walk(fullPath);
          continue;
        }
        const relative = this.prefix ? fullPath.slice(this.prefix.length + 1) : fullPath;
        const key = keyFromName(relative);
        if (!pattern || key.includes(pattern)) keys.push(key);
      }
    };

    await walk(this.prefix);
    return keys.sort();
  }
}

/**
 * Store backed by a bucket of the shared client
 */
export function createSupabaseStore(
  client: SupabaseClient,
  bucketName: string,
  prefix?: string
): IStore {
  return new SupabaseStore({ bucket: client.storage.from(bucketName), bucketName, prefix });
}
