/**
 * Social-media fallback policy: fetch, then synthesize if allowed, else omit.
 *
 * @module social-resolution
 */

import type { SocialPostSource } from "./social-fetcher";
import type { SyntheticDataGenerator } from "./synthetic-data";
import type { SocialOrigin, SocialPost } from "./types";

export type SocialResolution =
  | { origin: SocialOrigin; posts: SocialPost[] }
  | { origin: "none"; posts: [] };

export interface SocialResolutionDeps {
  source: SocialPostSource;
  generator: Pick<SyntheticDataGenerator, "socialPosts">;
  syntheticEnabled: boolean;
}

export async function resolveSocialPosts(
  term: string,
  deps: SocialResolutionDeps,
): Promise<SocialResolution> {
  const live = await deps.source.search(term);
  if (live.length > 0) {
    return { origin: "live", posts: live };
  }

  if (deps.syntheticEnabled) {
    const synthetic = deps.generator.socialPosts(term);
    if (synthetic.length > 0) {
      return { origin: "synthetic", posts: synthetic };
    }
  }

  return { origin: "none", posts: [] };
}
