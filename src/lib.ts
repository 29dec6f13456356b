export * from "./session/index.js";
export * from "./backends/index.js";
export * from "./menu/index.js";
export { createHubApp, startHub } from "./hub/server.js";
export type { HubAppOptions, HubHandle, HubServeOptions } from "./hub/server.js";
export { createInMemoryListingStore, toSearchResult } from "./shared/listings/index.js";
export type { Listing, ListingFilter, ListingStore } from "./shared/listings/index.js";
export {
  MatchlinkError,
  OperationInProgressError,
  NotImplementedError,
  InvalidSessionArgumentError,
} from "./shared/errors.js";
export { initLogger } from "./shared/logging.js";
