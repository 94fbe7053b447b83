/**
 * @foresight/news
 * Document sources used by the retrieval pipeline
 */

export { NewsCatcherClient, cleanNewsCatcherQuery, normalizeNewsCatcherArticle } from "./newscatcher.js";
export type { NewsCatcherClientOptions } from "./newscatcher.js";

export { GoogleNewsSource, buildGoogleNewsUrl, splitPublisher } from "./google-news.js";
export type { GoogleNewsItem, GoogleNewsSourceOptions } from "./google-news.js";

export { PageFetcher, extractPage, extractUrls } from "./page.js";
export type { PageFetcherOptions } from "./page.js";

export { toIsoDate, isValidDateRange } from "./dates.js";
export { isBlockedSite, siteOf } from "./sites.js";

export * from "./types.js";
