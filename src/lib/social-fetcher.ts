/**
 * Mirror search fetcher for public social-media posts.
 *
 * Queries a list of Nitter-style mirrors in order and returns the posts from
 * the first mirror that yields any. Never throws: when every mirror fails the
 * result is an empty list.
 */

import * as cheerio from "cheerio";
import type { FetcherConfig } from "./config-schemas";
import { classifyFetchError, MirrorFetchError } from "./error-classification";
import type { Logger } from "./logger";
import type { SocialPost } from "./types";

export const LIVE_PLATFORM = "Twitter";

/** Anything that can look up posts for a search term. */
export interface SocialPostSource {
  search(term: string): Promise<SocialPost[]>;
}

export class TimelineEntryError extends Error {
  constructor(
    public readonly index: number,
    message: string,
  ) {
    super(message);
    this.name = "TimelineEntryError";
  }
}

export function buildSearchUrl(mirror: string, term: string): string {
  return `${mirror.replace(/\/+$/, "")}/search?f=tweets&q=${encodeURIComponent(term)}`;
}

export interface TimelineParseOptions {
  mirror: string;
  maxEntries: number;
  onEntryError?: (error: unknown, index: number) => void;
}

/**
 * Extract posts from a mirror's search page. Only the first `maxEntries`
 * timeline items are considered; an item that cannot be parsed is reported
 * through `onEntryError` and skipped.
 */
export function parseTimelineHtml(html: string, options: TimelineParseOptions): SocialPost[] {
  const $ = cheerio.load(html);
  const items = $("div.timeline-item").slice(0, options.maxEntries).toArray();
  const posts: SocialPost[] = [];

  items.forEach((item, index) => {
    try {
      const $item = $(item);
      const contentEl = $item.find("div.tweet-content").first();
      if (contentEl.length === 0) {
        throw new TimelineEntryError(index, "timeline item has no tweet content");
      }
      const user = $item.find("a.username").first().text().trim();
      const date = $item.find("span.tweet-date a").first().attr("title") ?? "";

      posts.push({
        kind: "social",
        date,
        platform: LIVE_PLATFORM,
        user: user || "Unknown",
        content: contentEl.text().trim(),
        source: `Nitter scrape via ${options.mirror}`,
        synthetic: false,
      });
    } catch (err) {
      options.onEntryError?.(err, index);
    }
  });

  return posts;
}

export class MirrorSearchFetcher implements SocialPostSource {
  constructor(
    private readonly config: FetcherConfig,
    private readonly logger: Logger,
  ) {}

  async search(term: string): Promise<SocialPost[]> {
    for (const mirror of this.config.mirrors) {
      try {
        const posts = await this.searchMirror(mirror, term);
        if (posts.length > 0) {
          this.logger.info(`[Social] Found ${posts.length} posts for '${term}' on ${mirror}`);
          return posts;
        }
        this.logger.warn(`[Social] No posts found for '${term}' on ${mirror}`);
      } catch (err) {
        const classified = classifyFetchError(err);
        this.logger.error(
          `[Social] Mirror ${mirror} failed for '${term}' (${classified.category})`,
          classified.message,
        );
      }
    }

    this.logger.warn(`[Social] All mirrors failed for '${term}'`);
    return [];
  }

  private async searchMirror(mirror: string, term: string): Promise<SocialPost[]> {
    const res = await fetch(buildSearchUrl(mirror, term), {
      headers: { "User-Agent": this.config.userAgent },
      signal: AbortSignal.timeout(this.config.timeoutMs),
    });

    if (res.status !== 200) {
      // Release the connection; the body is never read
      await res.body?.cancel();
      throw new MirrorFetchError(mirror, res.status, `HTTP ${res.status} ${res.statusText}`.trim());
    }

    const html = await res.text();
    return parseTimelineHtml(html, {
      mirror,
      maxEntries: this.config.maxEntries,
      onEntryError: (error, index) =>
        this.logger.error(`[Social] Skipping unparseable entry ${index} from ${mirror}`, error),
    });
  }
}
