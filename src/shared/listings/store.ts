import type { JoinResult, SessionConfig } from "../../session/types.js";
import type { Listing, ListingFilter } from "./types.js";

export interface ListingStore {
  createListing(ownerId: string, hostAddress: string, config: SessionConfig): Listing;
  getListing(id: string): Listing | undefined;
  /** Advertised listings, oldest first, at most `filter.maxResults`. */
  listListings(filter: ListingFilter): Listing[];
  joinListing(id: string, playerId: string): JoinResult;
  leaveListing(id: string, playerId: string): boolean;
  startListing(id: string): boolean;
  removeListing(id: string): boolean;
}
