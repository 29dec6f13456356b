export type { Listing, ListingFilter } from "./types.js";
export type { ListingStore } from "./store.js";
export { createInMemoryListingStore, toSearchResult } from "./in-memory.js";
export type { InMemoryListingStoreOptions } from "./in-memory.js";
