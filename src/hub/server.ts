import { serve } from "@hono/node-server";
import { Hono } from "hono";
import { ArkErrors } from "arktype";
import { VERSION } from "../shared/constants.js";
import { EXIT, exit } from "../shared/errors.js";
import { componentLogger } from "../shared/logging.js";
import { createInMemoryListingStore, type ListingStore } from "../shared/listings/index.js";
import { JoinResult } from "../session/types.js";
import { CreateListingBodySchema, PlayerBodySchema } from "./schemas.js";

const DEFAULT_LIST_LIMIT = 50;
const MAX_LIST_LIMIT = 10_000;

export interface HubAppOptions {
  store?: ListingStore;
  /** When set, every /api route requires `Authorization: Bearer <token>`. */
  token?: string;
}

export interface HubServeOptions extends HubAppOptions {
  host: string;
  port: number;
}

export interface HubHandle {
  port: number;
  host: string;
  close: () => Promise<void>;
}

function parseLimit(raw: string | undefined): number {
  const n = raw === undefined ? DEFAULT_LIST_LIMIT : parseInt(raw, 10);
  if (Number.isNaN(n) || n <= 0) return DEFAULT_LIST_LIMIT;
  return Math.min(n, MAX_LIST_LIMIT);
}

export function createHubApp(options: HubAppOptions = {}): Hono {
  const app = new Hono();
  const store = options.store ?? createInMemoryListingStore();
  const logger = componentLogger("hub");

  app.get("/health", (c) => c.json({ ok: true, version: VERSION }));

  if (options.token) {
    const expected = `Bearer ${options.token}`;
    app.use("/api/*", async (c, next) => {
      if (c.req.header("Authorization") !== expected) {
        return c.json({ error: "Unauthorized" }, 401);
      }
      await next();
    });
  }

  app.get("/api/sessions", (c) => {
    const listings = store.listListings({
      maxResults: parseLimit(c.req.query("maxResults")),
      lobbiesOnly: c.req.query("lobbiesOnly") === "true",
      exclude: c.req.query("exclude") || undefined,
    });
    return c.json(listings);
  });

  app.post("/api/sessions", async (c) => {
    const body = CreateListingBodySchema(await c.req.json().catch(() => undefined));
    if (body instanceof ArkErrors) return c.json({ error: body.summary }, 400);
    const listing = store.createListing(body.ownerId, body.hostAddress, body.config);
    logger.info(
      { id: listing.id, owner: listing.ownerId, matchTag: listing.config.matchTag },
      "session listed"
    );
    return c.json(listing, 201);
  });

  app.get("/api/sessions/:id", (c) => {
    const listing = store.getListing(c.req.param("id"));
    if (!listing) return c.json({ error: "Not found" }, 404);
    return c.json(listing);
  });

  app.post("/api/sessions/:id/join", async (c) => {
    const body = PlayerBodySchema(await c.req.json().catch(() => undefined));
    if (body instanceof ArkErrors) return c.json({ error: body.summary }, 400);
    const id = c.req.param("id");
    const result = store.joinListing(id, body.playerId);
    if (result !== JoinResult.Success) {
      logger.debug({ id, player: body.playerId, result }, "join refused");
      return c.json({ result });
    }
    const listing = store.getListing(id);
    if (!listing) return c.json({ result: JoinResult.CouldNotRetrieveAddress });
    return c.json({ result, connectAddress: listing.hostAddress });
  });

  app.post("/api/sessions/:id/leave", async (c) => {
    const body = PlayerBodySchema(await c.req.json().catch(() => undefined));
    if (body instanceof ArkErrors) return c.json({ error: body.summary }, 400);
    return c.json({ ok: store.leaveListing(c.req.param("id"), body.playerId) });
  });

  app.post("/api/sessions/:id/start", async (c) => {
    const body = PlayerBodySchema(await c.req.json().catch(() => undefined));
    if (body instanceof ArkErrors) return c.json({ error: body.summary }, 400);
    const listing = store.getListing(c.req.param("id"));
    if (!listing) return c.json({ ok: false }, 404);
    if (listing.ownerId !== body.playerId) return c.json({ ok: false }, 403);
    return c.json({ ok: store.startListing(listing.id) });
  });

  // Only the owner may unlist; other players leave instead.
  app.delete("/api/sessions/:id", async (c) => {
    const body = PlayerBodySchema(await c.req.json().catch(() => undefined));
    if (body instanceof ArkErrors) return c.json({ error: body.summary }, 400);
    const listing = store.getListing(c.req.param("id"));
    if (!listing) return c.json({ ok: false }, 404);
    if (listing.ownerId !== body.playerId) {
      logger.warn({ id: listing.id, player: body.playerId }, "unlist refused for non-owner");
      return c.json({ ok: false }, 403);
    }
    const ok = store.removeListing(listing.id);
    if (ok) logger.info({ id: listing.id }, "session unlisted");
    return c.json({ ok });
  });

  return app;
}

export async function startHub(options: HubServeOptions): Promise<HubHandle> {
  const app = createHubApp(options);
  const { host, port } = options;

  const nodeServer = serve({
    fetch: app.fetch,
    port,
    hostname: host,
  });

  nodeServer.on("error", (err: NodeJS.ErrnoException) => {
    if (err?.code === "EADDRINUSE") {
      exit(
        EXIT.SERVER_FAILURE,
        `Cannot listen on ${host}:${port} (EADDRINUSE). Choose a different port with --listen ${host}:<port>`
      );
    }
    throw err;
  });

  return {
    host,
    port,
    close: () =>
      new Promise((resolve, reject) => {
        nodeServer.close((err) => (err ? reject(err) : resolve()));
      }),
  };
}
