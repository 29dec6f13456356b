import { describe, it, expect } from "vitest";
import { createHubApp } from "../../src/hub/server.js";
import { ListingListSchema, ListingSchema, parseWith } from "../../src/hub/schemas.js";
import { buildSessionConfig } from "../../src/session/config.js";
import { createInMemoryListingStore } from "../../src/shared/listings/index.js";

const json = (body: unknown): RequestInit => ({
  method: "POST",
  headers: { "Content-Type": "application/json" },
  body: JSON.stringify(body),
});

const unlist = (playerId: string): RequestInit => ({ ...json({ playerId }), method: "DELETE" });

const config = buildSessionConfig("HOSTED", 2, "FreeForAll");

async function createListing(app: ReturnType<typeof createHubApp>, ownerId = "host-1") {
  const res = await app.request("/api/sessions", json({ ownerId, hostAddress: "203.0.113.5:7777", config }));
  expect(res.status).toBe(201);
  return parseWith(ListingSchema, await res.json(), "listing");
}

describe("hub server", () => {
  it("GET /health reports the version", async () => {
    const app = createHubApp();
    const res = await app.request("/health");
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ ok: true, version: "0.1.0" });
  });

  it("POST /api/sessions lists a session", async () => {
    const store = createInMemoryListingStore();
    const app = createHubApp({ store });
    const listing = await createListing(app);
    expect(listing.ownerId).toBe("host-1");
    expect(listing.config).toEqual(config);
    expect(listing.members).toEqual([]);
    expect(store.getListing(listing.id)?.hostAddress).toBe("203.0.113.5:7777");
  });

  it("POST /api/sessions rejects an invalid body", async () => {
    const app = createHubApp();
    const res = await app.request("/api/sessions", json({ ownerId: "", hostAddress: "h:1", config }));
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: expect.any(String) });
  });

  it("GET /api/sessions excludes the caller's own listings", async () => {
    const app = createHubApp();
    await createListing(app, "host-1");
    const other = await createListing(app, "host-2");

    const res = await app.request("/api/sessions?maxResults=10&lobbiesOnly=true&exclude=host-1");
    const listings = parseWith(ListingListSchema, await res.json(), "listing list");
    expect(listings.map((l) => l.id)).toEqual([other.id]);
  });

  it("GET /api/sessions/:id returns 404 for unknown ids", async () => {
    const app = createHubApp();
    const res = await app.request("/api/sessions/lst-missing");
    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: "Not found" });
  });

  it("join returns the host address on success and the refusal code otherwise", async () => {
    const app = createHubApp();
    const listing = await createListing(app);

    const joined = await app.request(`/api/sessions/${listing.id}/join`, json({ playerId: "p1" }));
    expect(await joined.json()).toEqual({ result: "success", connectAddress: "203.0.113.5:7777" });

    const again = await app.request(`/api/sessions/${listing.id}/join`, json({ playerId: "p1" }));
    expect(await again.json()).toEqual({ result: "already-in-session" });

    const missing = await app.request("/api/sessions/lst-missing/join", json({ playerId: "p1" }));
    expect(await missing.json()).toEqual({ result: "session-does-not-exist" });
  });

  it("leave frees the member slot", async () => {
    const app = createHubApp();
    const listing = await createListing(app);
    await app.request(`/api/sessions/${listing.id}/join`, json({ playerId: "p1" }));
    const res = await app.request(`/api/sessions/${listing.id}/leave`, json({ playerId: "p1" }));
    expect(await res.json()).toEqual({ ok: true });
  });

  it("only the owner may start a session", async () => {
    const app = createHubApp();
    const listing = await createListing(app, "host-1");

    const denied = await app.request(`/api/sessions/${listing.id}/start`, json({ playerId: "p1" }));
    expect(denied.status).toBe(403);

    const started = await app.request(`/api/sessions/${listing.id}/start`, json({ playerId: "host-1" }));
    expect(await started.json()).toEqual({ ok: true });

    const res = await app.request(`/api/sessions/${listing.id}`);
    expect(parseWith(ListingSchema, await res.json(), "listing").state).toBe("in-progress");
  });

  it("DELETE /api/sessions/:id unlists once for the owner", async () => {
    const app = createHubApp();
    const listing = await createListing(app);
    const first = await app.request(`/api/sessions/${listing.id}`, unlist("host-1"));
    expect(first.status).toBe(200);
    expect(await first.json()).toEqual({ ok: true });
    const second = await app.request(`/api/sessions/${listing.id}`, unlist("host-1"));
    expect(second.status).toBe(404);
  });

  it("DELETE /api/sessions/:id refuses anyone but the owner", async () => {
    const store = createInMemoryListingStore();
    const app = createHubApp({ store });
    const listing = await createListing(app);

    const stranger = await app.request(`/api/sessions/${listing.id}`, unlist("player-9"));
    expect(stranger.status).toBe(403);
    expect(await stranger.json()).toEqual({ ok: false });
    expect(store.getListing(listing.id)?.ownerId).toBe("host-1");

    const anonymous = await app.request(`/api/sessions/${listing.id}`, { method: "DELETE" });
    expect(anonymous.status).toBe(400);
    expect(store.getListing(listing.id)).toBeDefined();
  });

  it("requires the bearer token on /api routes when configured", async () => {
    const app = createHubApp({ token: "test-secret" });
    const anonymous = await app.request("/api/sessions");
    expect(anonymous.status).toBe(401);
    expect(await anonymous.json()).toEqual({ error: "Unauthorized" });

    const authorized = await app.request("/api/sessions", {
      headers: { Authorization: "Bearer test-secret" },
    });
    expect(authorized.status).toBe(200);
    expect(await authorized.json()).toEqual([]);

    const health = await app.request("/health");
    expect(health.status).toBe(200);
  });
});
