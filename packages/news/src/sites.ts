/**
 * Sites whose pages cannot be scraped or would leak forecast answers
 */

import fs from "fs";
import { z } from "zod";

const BlockedSitesFileSchema = z.object({
  blockedSites: z.array(z.string().min(1)),
});

function loadBlockedSites(): string[] {
  const raw = fs.readFileSync(new URL("../data/blocked-sites.json", import.meta.url), "utf-8");
  const parsed = BlockedSitesFileSchema.parse(JSON.parse(raw));
  return parsed.blockedSites.map((site) => site.toLowerCase());
}

const BLOCKED_SITES = loadBlockedSites();

/**
 * True when any entry occurs anywhere in the lowercased URL. Entries may
 * carry a path ("c-span.org/video"); "si.com" also matches "asi.com".
 */
export function isBlockedSite(url: string, extra: readonly string[] = []): boolean {
  const lowered = url.toLowerCase();
  return [...BLOCKED_SITES, ...extra].some((site) => lowered.includes(site));
}

/**
 * Host without a leading "www."
 */
export function siteOf(url: string): string {
  try {
    return new URL(url).hostname.replace(/^www\./, "");
  } catch {
    return "";
  }
}
