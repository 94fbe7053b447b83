/**
 * Store Types
 * Interface for the results sink
 */

// ============================================
// STORE INTERFACE
// ============================================

/**
 * Key-value blob store. Keys are slash-separated paths; a key without an
 * extension is stored as JSON under "{key}.json".
 */
export interface IStore {
  /**
   * Read data from store
   */
  read<T>(key: string): Promise<T | null>;

  /**
   * Write data to store
   */
  write<T>(key: string, data: T): Promise<void>;

  /**
   * Check if key exists
   */
  exists(key: string): Promise<boolean>;

  /**
   * Delete data
   */
  delete(key: string): Promise<boolean>;

  /**
   * List keys containing pattern
   */
  list(pattern?: string): Promise<string[]>;

  /**
   * Location of a key in the backing store
   */
  getPath(key: string): string;
}

// ============================================
// STORE OPTIONS
// ============================================

export interface StoreOptions {
  /** Base directory or object prefix */
  basePath: string;

  /** Pretty print JSON */
  prettyPrint?: boolean;
}

/**
 * Keys are stored as-is when they carry an extension
 */
export function normalizeKey(key: string): string {
  const name = key.split("/").pop() ?? key;
  return name.includes(".") ? key : `${key}.json`;
}

/**
 * Display key for a stored name: ".json" is implicit
 */
export function keyFromName(name: string): string {
  return name.replace(/\.json$/, "");
}
