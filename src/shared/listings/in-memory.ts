import { genId } from "../ids.js";
import { JoinResult, type SessionConfig, type SessionSearchResult } from "../../session/types.js";
import type { ListingStore } from "./store.js";
import type { Listing, ListingFilter } from "./types.js";

export interface InMemoryListingStoreOptions {
  onListingChanged?: (listing: Listing, change: "created" | "joined" | "left" | "started" | "removed") => void;
}

export function createInMemoryListingStore(options: InMemoryListingStoreOptions = {}): ListingStore {
  const listings = new Map<string, Listing>();
  const notify = options.onListingChanged;

  return {
    createListing(ownerId: string, hostAddress: string, config: SessionConfig): Listing {
      const now = Date.now();
      const listing: Listing = {
        id: genId("lst"),
        ownerId,
        hostAddress,
        config,
        members: [],
        state: "pending",
        createdAt: now,
        updatedAt: now,
      };
      listings.set(listing.id, listing);
      notify?.(listing, "created");
      return listing;
    },

    getListing(id: string): Listing | undefined {
      return listings.get(id);
    },

    listListings(filter: ListingFilter): Listing[] {
      return Array.from(listings.values())
        .filter((l) => l.config.shouldAdvertise)
        .filter((l) => !filter.lobbiesOnly || l.config.preferLobbies)
        .filter((l) => !filter.mode || l.config.advertisingMode === filter.mode)
        .filter((l) => !filter.exclude || l.ownerId !== filter.exclude)
        .sort((a, b) => a.createdAt - b.createdAt)
        .slice(0, Math.max(0, filter.maxResults));
    },

    joinListing(id: string, playerId: string): JoinResult {
      const listing = listings.get(id);
      if (!listing) return JoinResult.SessionDoesNotExist;
      if (listing.ownerId === playerId || listing.members.includes(playerId)) {
        return JoinResult.AlreadyInSession;
      }
      // No open slot for late joiners once the match has started without join-in-progress.
      if (listing.state === "in-progress" && !listing.config.joinInProgressAllowed) {
        return JoinResult.SessionIsFull;
      }
      if (listing.members.length >= listing.config.maxPublicSlots) {
        return JoinResult.SessionIsFull;
      }
      listing.members.push(playerId);
      listing.updatedAt = Date.now();
      notify?.(listing, "joined");
      return JoinResult.Success;
    },

    leaveListing(id: string, playerId: string): boolean {
      const listing = listings.get(id);
      if (!listing) return false;
      const index = listing.members.indexOf(playerId);
      if (index === -1) return false;
      listing.members.splice(index, 1);
      listing.updatedAt = Date.now();
      notify?.(listing, "left");
      return true;
    },

    startListing(id: string): boolean {
      const listing = listings.get(id);
      if (!listing) return false;
      listing.state = "in-progress";
      listing.updatedAt = Date.now();
      notify?.(listing, "started");
      return true;
    },

    removeListing(id: string): boolean {
      const listing = listings.get(id);
      if (!listing) return false;
      listings.delete(id);
      notify?.(listing, "removed");
      return true;
    },
  };
}

/** Search-result view of a listing, as handed to the orchestrator. */
export function toSearchResult(listing: Listing): SessionSearchResult {
  return {
    handle: listing.id,
    ownerId: listing.ownerId,
    openSlots: Math.max(0, listing.config.maxPublicSlots - listing.members.length),
    attributes: {
      matchTag: listing.config.matchTag,
      advertisingMode: listing.config.advertisingMode,
    },
  };
}
