export * from "./types.js";
export { FileStore, createFileStore } from "./file.js";
export {
  SupabaseStore,
  createSupabaseStore,
  getSupabase,
  resetSupabase,
  type BucketClient,
  type SupabaseStoreOptions,
} from "./supabase.js";
