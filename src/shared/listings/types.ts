import type { SessionConfig, SessionState } from "../../session/types.js";

/** An advertised session as the directory (LAN domain or hub) keeps it. */
export interface Listing {
  id: string;
  ownerId: string;
  hostAddress: string;
  config: SessionConfig;
  /** Joined players, host excluded. */
  members: string[];
  state: SessionState;
  createdAt: number;
  updatedAt: number;
}

export interface ListingFilter {
  maxResults: number;
  lobbiesOnly?: boolean;
  mode?: SessionConfig["advertisingMode"];
  /** Owner whose own listings are left out (the searching player). */
  exclude?: string;
}
