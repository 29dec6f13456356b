import { LAN_BACKEND_IDENTITY } from "../shared/constants.js";
import { InvalidSessionArgumentError } from "../shared/errors.js";
import type { AdvertisingMode, SessionConfig, SessionSearchQuery, SessionSearchResult } from "./types.js";

export function isLanIdentity(identity: string): boolean {
  return identity === LAN_BACKEND_IDENTITY;
}

export function advertisingModeFor(identity: string): AdvertisingMode {
  return isLanIdentity(identity) ? "lan" : "hosted";
}

/**
 * Session settings for one create attempt. Join-in-progress, presence and lobby
 * preference are fixed policy, not caller options.
 */
export function buildSessionConfig(
  identity: string,
  maxPublicSlots: number,
  matchTag: string
): SessionConfig {
  if (!Number.isInteger(maxPublicSlots) || maxPublicSlots < 0) {
    throw new InvalidSessionArgumentError(
      `maxPublicSlots must be a non-negative integer, got ${maxPublicSlots}`
    );
  }
  return Object.freeze({
    maxPublicSlots,
    matchTag,
    advertisingMode: advertisingModeFor(identity),
    joinInProgressAllowed: true,
    usesPresence: true,
    preferLobbies: true,
    shouldAdvertise: true,
  });
}

export function buildSearchQuery(identity: string, maxResults: number): SessionSearchQuery {
  if (!Number.isInteger(maxResults) || maxResults <= 0) {
    throw new InvalidSessionArgumentError(
      `maxResults must be a positive integer, got ${maxResults}`
    );
  }
  return Object.freeze({
    maxResults,
    lanOnly: isLanIdentity(identity),
    lobbiesOnly: true,
  });
}

/** First result advertising the given match tag, if any. */
export function selectByMatchTag(
  results: readonly SessionSearchResult[],
  matchTag: string
): SessionSearchResult | undefined {
  return results.find((r) => r.attributes.matchTag === matchTag);
}
