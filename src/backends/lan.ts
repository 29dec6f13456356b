/**
 * LAN session provider. Every backend created over the same ListingStore sees
 * the others' advertisements, as hosts on one broadcast domain would.
 * Completions are delivered on a later tick; searches after `searchDelayMs`.
 */

import { DEFAULT_PLAYER_ADDRESS, LAN_BACKEND_IDENTITY } from "../shared/constants.js";
import { toSearchResult, type ListingStore } from "../shared/listings/index.js";
import { JoinResult, type SessionConfig, type SessionSearchQuery, type SessionSearchResult } from "../session/types.js";
import { BaseSessionBackend } from "./base.js";

export interface LanBackendOptions {
  directory: ListingStore;
  /** Address other players connect to when this host owns the session. */
  playerAddress?: string;
  searchDelayMs?: number;
}

export class LanSessionBackend extends BaseSessionBackend {
  readonly identity = LAN_BACKEND_IDENTITY;

  private readonly directory: ListingStore;
  private readonly playerAddress: string;
  private readonly searchDelayMs: number;
  private readonly connectAddresses = new Map<string, string>();
  private readonly members = new Map<string, string>();

  constructor(options: LanBackendOptions) {
    super("lan-backend");
    this.directory = options.directory;
    this.playerAddress = options.playerAddress ?? DEFAULT_PLAYER_ADDRESS;
    this.searchDelayMs = options.searchDelayMs ?? 0;
  }

  createSession(localPlayerId: string, sessionName: string, config: SessionConfig): boolean {
    if (this.isNameTaken(sessionName)) {
      this.logger.warn({ session: sessionName }, "session already exists");
      return false;
    }
    const listing = this.directory.createListing(localPlayerId, this.playerAddress, config);
    this.sessions.set(sessionName, {
      name: sessionName,
      handle: listing.id,
      state: "pending",
      config,
      hosting: true,
    });
    this.logger.debug({ session: sessionName, listing: listing.id }, "advertising LAN session");
    setImmediate(() => this.complete("create", { sessionName, success: true }));
    return true;
  }

  findSessions(localPlayerId: string, query: SessionSearchQuery): boolean {
    setTimeout(() => {
      const results = this.directory
        .listListings({
          maxResults: query.maxResults,
          lobbiesOnly: query.lobbiesOnly,
          mode: "lan",
          exclude: localPlayerId,
        })
        .map(toSearchResult);
      this.complete("find", { results, success: true });
    }, this.searchDelayMs);
    return true;
  }

  joinSession(localPlayerId: string, sessionName: string, result: SessionSearchResult): boolean {
    if (this.isNameTaken(sessionName)) {
      this.logger.warn({ session: sessionName }, "already in a session under this name");
      return false;
    }
    this.pending.add(sessionName);
    setImmediate(() => {
      this.pending.delete(sessionName);
      const outcome = this.directory.joinListing(result.handle, localPlayerId);
      const listing = this.directory.getListing(result.handle);
      if (outcome === JoinResult.Success && listing) {
        this.sessions.set(sessionName, {
          name: sessionName,
          handle: listing.id,
          state: listing.state,
          config: listing.config,
          hosting: false,
        });
        this.connectAddresses.set(sessionName, listing.hostAddress);
        this.members.set(sessionName, localPlayerId);
      }
      this.complete("join", { sessionName, result: outcome });
    });
    return true;
  }

  destroySession(sessionName: string): boolean {
    const session = this.sessions.get(sessionName);
    if (!session) return false;
    // The name is released before returning so a create may follow immediately.
    this.sessions.delete(sessionName);
    this.connectAddresses.delete(sessionName);
    const member = this.members.get(sessionName);
    this.members.delete(sessionName);
    const success = session.hosting
      ? this.directory.removeListing(session.handle)
      : member !== undefined && this.directory.leaveListing(session.handle, member);
    setImmediate(() => this.complete("destroy", { sessionName, success }));
    return true;
  }

  startSession(sessionName: string): boolean {
    const session = this.sessions.get(sessionName);
    if (!session) return false;
    const success = session.hosting ? this.directory.startListing(session.handle) : true;
    if (success) this.sessions.set(sessionName, { ...session, state: "in-progress" });
    setImmediate(() => this.complete("start", { sessionName, success }));
    return true;
  }

  getResolvedConnectAddress(sessionName: string): string | undefined {
    const session = this.sessions.get(sessionName);
    if (!session) return undefined;
    return session.hosting ? this.playerAddress : this.connectAddresses.get(sessionName);
  }
}

export function createLanBackend(options: LanBackendOptions): LanSessionBackend {
  return new LanSessionBackend(options);
}
