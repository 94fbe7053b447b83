import { afterEach, beforeEach, describe, expect, it } from "vitest";
import fs from "fs/promises";
import os from "os";
import path from "path";
import { ForesightError } from "@foresight/core";
import { FileStore } from "../src/shared/store/file.js";
import { SupabaseStore, type BucketClient } from "../src/shared/store/supabase.js";
import { normalizeKey } from "../src/shared/store/types.js";

describe("normalizeKey", () => {
  it("adds .json to keys without an extension", () => {
    expect(normalizeKey("runs/0/question")).toBe("runs/0/question.json");
    expect(normalizeKey("runs/0/notes.txt")).toBe("runs/0/notes.txt");
  });
});

describe("FileStore", () => {
  let dir: string;
  let store: FileStore;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "forecast-store-"));
    store = new FileStore({ basePath: dir });
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("round-trips JSON under nested keys", async () => {
    await store.write("runs/0/question", { prediction: 0.4 });

    expect(store.getPath("runs/0/question")).toBe(path.join(dir, "runs/0/question.json"));
    await expect(store.read("runs/0/question")).resolves.toEqual({ prediction: 0.4 });
    await expect(store.exists("runs/0/question")).resolves.toBe(true);
  });

  it("lists keys without the implicit extension", async () => {
    await store.write("runs/0/b", 1);
    await store.write("runs/0/a", 2);
    await store.write("other/c", 3);

    await expect(store.list()).resolves.toEqual(["other/c", "runs/0/a", "runs/0/b"]);
    await expect(store.list("runs/")).resolves.toEqual(["runs/0/a", "runs/0/b"]);
  });

  it("treats missing keys as absent", async () => {
    await expect(store.read("nope")).resolves.toBeNull();
    await expect(store.exists("nope")).resolves.toBe(false);
    await expect(store.delete("nope")).resolves.toBe(false);
  });

  it("deletes keys", async () => {
    await store.write("gone", true);
    await expect(store.delete("gone")).resolves.toBe(true);
    await expect(store.exists("gone")).resolves.toBe(false);
  });
});

/**
 * Flat in-memory bucket with folder listing like Supabase Storage
 */
function memoryBucket(objects = new Map<string, string>(), failUploads = false): BucketClient {
  return {
    async download(objectPath) {
      const content = objects.get(objectPath);
      if (content === undefined) return { data: null, error: { message: "Object not found" } };
      return { data: new Blob([content]), error: null };
    },

    async upload(objectPath, body) {
      if (failUploads) return { error: { message: "quota exceeded" } };
      objects.set(objectPath, body);
      return { error: null };
    },

    async list(dir = "", options) {
      const prefix = dir ? `${dir}/` : "";
      const entries = new Map<string, { name: string; id: string | null }>();
      for (const key of objects.keys()) {
        if (!key.startsWith(prefix)) continue;
        const rest = key.slice(prefix.length);
        const slash = rest.indexOf("/");
        const entry = slash === -1 ? { name: rest, id: `id-${rest}` } : { name: rest.slice(0, slash), id: null };
        if (options?.search && !entry.name.includes(options.search)) continue;
        entries.set(entry.name, entry);
      }
      return { data: [...entries.values()], error: null };
    },

    async remove(paths) {
      const removed = paths.filter((objectPath) => objects.delete(objectPath));
      return { data: removed, error: null };
    },
  };
}

describe("SupabaseStore", () => {
  it("stores objects under the prefix", async () => {
    const objects = new Map<string, string>();
    const store = new SupabaseStore({ bucket: memoryBucket(objects), bucketName: "forecasts", prefix: "/runs/" });

    await store.write("0/question", { prediction: 0.4 });

    expect([...objects.keys()]).toEqual(["runs/0/question.json"]);
    expect(store.getPath("0/question")).toBe("forecasts/runs/0/question.json");
    await expect(store.read("0/question")).resolves.toEqual({ prediction: 0.4 });
  });

  it("checks existence by listing the folder", async () => {
    const store = new SupabaseStore({ bucket: memoryBucket(), bucketName: "forecasts", prefix: "runs" });
    await store.write("0/question", 1);

    await expect(store.exists("0/question")).resolves.toBe(true);
    await expect(store.exists("0/other")).resolves.toBe(false);
    await expect(store.read("0/other")).resolves.toBeNull();
  });

  it("lists keys recursively relative to the prefix", async () => {
    const store = new SupabaseStore({ bucket: memoryBucket(), bucketName: "forecasts", prefix: "runs" });
    await store.write("1/b", 1);
    await store.write("0/a", 2);

    await expect(store.list()).resolves.toEqual(["0/a", "1/b"]);
    await expect(store.list("1/")).resolves.toEqual(["1/b"]);
  });

  it("deletes objects", async () => {
    const store = new SupabaseStore({ bucket: memoryBucket(), bucketName: "forecasts" });
    await store.write("question", 1);

    await expect(store.delete("question")).resolves.toBe(true);
    await expect(store.delete("question")).resolves.toBe(false);
  });

  it("surfaces storage failures", async () => {
    const store = new SupabaseStore({ bucket: memoryBucket(new Map(), true), bucketName: "forecasts" });

    await expect(store.write("question", 1)).rejects.toMatchObject({
      code: "STORE_ERROR",
      message: "Supabase storage upload failed for question.json: quota exceeded",
    });
    await expect(store.write("question", 1)).rejects.toBeInstanceOf(ForesightError);
  });
});
