/**
 * Hosted session provider: a client of the matchmaking hub (see src/hub/server.ts).
 * Every accepted call issues one HTTP request and completes when the hub answers;
 * transport and validation errors complete as failures.
 */

import { DEFAULT_PLAYER_ADDRESS, HOSTED_BACKEND_IDENTITY } from "../shared/constants.js";
import { joinUrl } from "../shared/net.js";
import { toSearchResult } from "../shared/listings/index.js";
import {
  JoinResponseSchema,
  ListingListSchema,
  ListingSchema,
  OkResponseSchema,
  parseWith,
} from "../hub/schemas.js";
import { JoinResult, type SessionConfig, type SessionSearchQuery, type SessionSearchResult } from "../session/types.js";
import { BaseSessionBackend } from "./base.js";

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface HostedBackendOptions {
  hubUrl: string;
  /** Address advertised to joiners when this host owns the session. */
  playerAddress?: string;
  token?: string;
  fetch?: FetchLike;
}

export class HostedSessionBackend extends BaseSessionBackend {
  readonly identity = HOSTED_BACKEND_IDENTITY;

  private readonly hubUrl: string;
  private readonly playerAddress: string;
  private readonly token: string | undefined;
  private readonly fetchImpl: FetchLike;
  private readonly connectAddresses = new Map<string, string>();
  /** Local player id under which each named session was created or joined. */
  private readonly localPlayers = new Map<string, string>();

  constructor(options: HostedBackendOptions) {
    super("hosted-backend");
    this.hubUrl = options.hubUrl;
    this.playerAddress = options.playerAddress ?? DEFAULT_PLAYER_ADDRESS;
    this.token = options.token;
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
  }

  createSession(localPlayerId: string, sessionName: string, config: SessionConfig): boolean {
    if (this.isNameTaken(sessionName)) {
      this.logger.warn({ session: sessionName }, "session already exists");
      return false;
    }
    this.pending.add(sessionName);
    void this.request("POST", "/api/sessions", {
      ownerId: localPlayerId,
      hostAddress: this.playerAddress,
      config,
    })
      .then((body) => {
        const listing = parseWith(ListingSchema, body, "listing");
        this.sessions.set(sessionName, {
          name: sessionName,
          handle: listing.id,
          state: listing.state,
          config,
          hosting: true,
        });
        this.localPlayers.set(sessionName, localPlayerId);
        return true;
      })
      .catch((err: unknown) => {
        this.logger.warn({ err, session: sessionName }, "hub create failed");
        return false;
      })
      .then((success) => {
        this.pending.delete(sessionName);
        this.complete("create", { sessionName, success });
      });
    return true;
  }

  findSessions(localPlayerId: string, query: SessionSearchQuery): boolean {
    const params = new URLSearchParams({
      maxResults: String(query.maxResults),
      lobbiesOnly: String(query.lobbiesOnly),
      exclude: localPlayerId,
    });
    void this.request("GET", `/api/sessions?${params.toString()}`)
      .then((body) => {
        const listings = parseWith(ListingListSchema, body, "listing list");
        return { results: listings.map(toSearchResult), success: true };
      })
      .catch((err: unknown) => {
        this.logger.warn({ err }, "hub search failed");
        return { results: [], success: false };
      })
      .then((completion) => this.complete("find", completion));
    return true;
  }

  joinSession(localPlayerId: string, sessionName: string, result: SessionSearchResult): boolean {
    if (this.isNameTaken(sessionName)) {
      this.logger.warn({ session: sessionName }, "already in a session under this name");
      return false;
    }
    this.pending.add(sessionName);
    void this.request("POST", `/api/sessions/${encodeURIComponent(result.handle)}/join`, {
      playerId: localPlayerId,
    })
      .then((body) => {
        const response = parseWith(JoinResponseSchema, body, "join response");
        if (response.result !== JoinResult.Success) return response.result;
        if (!response.connectAddress) return JoinResult.CouldNotRetrieveAddress;
        this.sessions.set(sessionName, {
          name: sessionName,
          handle: result.handle,
          state: "pending",
          hosting: false,
        });
        this.connectAddresses.set(sessionName, response.connectAddress);
        this.localPlayers.set(sessionName, localPlayerId);
        return JoinResult.Success;
      })
      .catch((err: unknown): JoinResult => {
        this.logger.warn({ err, session: sessionName }, "hub join failed");
        return JoinResult.UnknownError;
      })
      .then((outcome) => {
        this.pending.delete(sessionName);
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
    const playerId = this.localPlayers.get(sessionName) ?? "";
    this.localPlayers.delete(sessionName);
    const id = encodeURIComponent(session.handle);
    const reply = session.hosting
      ? this.request("DELETE", `/api/sessions/${id}`, { playerId })
      : this.request("POST", `/api/sessions/${id}/leave`, { playerId });
    void reply
      .then((body) => parseWith(OkResponseSchema, body, "destroy response").ok)
      .catch((err: unknown) => {
        this.logger.warn({ err, session: sessionName }, "hub destroy failed");
        return false;
      })
      .then((success) => this.complete("destroy", { sessionName, success }));
    return true;
  }

  startSession(sessionName: string): boolean {
    const session = this.sessions.get(sessionName);
    if (!session) return false;
    if (!session.hosting) {
      // Only the host starts the match on the hub; a joined client just records it.
      this.sessions.set(sessionName, { ...session, state: "in-progress" });
      setImmediate(() => this.complete("start", { sessionName, success: true }));
      return true;
    }
    const playerId = this.localPlayers.get(sessionName) ?? "";
    void this.request("POST", `/api/sessions/${encodeURIComponent(session.handle)}/start`, { playerId })
      .then((body) => parseWith(OkResponseSchema, body, "start response").ok)
      .catch((err: unknown) => {
        this.logger.warn({ err, session: sessionName }, "hub start failed");
        return false;
      })
      .then((success) => {
        const current = this.sessions.get(sessionName);
        if (success && current) this.sessions.set(sessionName, { ...current, state: "in-progress" });
        this.complete("start", { sessionName, success });
      });
    return true;
  }

  getResolvedConnectAddress(sessionName: string): string | undefined {
    const session = this.sessions.get(sessionName);
    if (!session) return undefined;
    return session.hosting ? this.playerAddress : this.connectAddresses.get(sessionName);
  }

  private async request(method: "GET" | "POST" | "DELETE", path: string, body?: unknown): Promise<unknown> {
    const headers: Record<string, string> = { Accept: "application/json" };
    if (body !== undefined) headers["Content-Type"] = "application/json";
    if (this.token) headers.Authorization = `Bearer ${this.token}`;
    const res = await this.fetchImpl(joinUrl(this.hubUrl, path), {
      method,
      headers,
      body: body === undefined ? undefined : JSON.stringify(body),
    });
    if (!res.ok) {
      throw new Error(`Hub responded ${res.status} to ${method} ${path}`);
    }
    return res.json();
  }
}

export function createHostedBackend(options: HostedBackendOptions): HostedSessionBackend {
  return new HostedSessionBackend(options);
}
