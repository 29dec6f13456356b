import { ArkErrors, type } from "arktype";

export const SessionConfigSchema = type({
  maxPublicSlots: "number >= 0",
  matchTag: "string",
  advertisingMode: "'lan' | 'hosted'",
  joinInProgressAllowed: "boolean",
  usesPresence: "boolean",
  preferLobbies: "boolean",
  shouldAdvertise: "boolean",
});

export const CreateListingBodySchema = type({
  ownerId: "string > 0",
  hostAddress: "string > 0",
  config: SessionConfigSchema,
});

export const PlayerBodySchema = type({
  playerId: "string > 0",
});

export const ListingSchema = type({
  id: "string",
  ownerId: "string",
  hostAddress: "string",
  config: SessionConfigSchema,
  members: "string[]",
  state: "'pending' | 'in-progress'",
  createdAt: "number",
  updatedAt: "number",
});

export const ListingListSchema = ListingSchema.array();

export const JoinResponseSchema = type({
  result:
    "'success' | 'session-is-full' | 'session-does-not-exist' | 'could-not-retrieve-address' | 'already-in-session' | 'unknown-error'",
  "connectAddress?": "string",
});

export const OkResponseSchema = type({
  ok: "boolean",
});

/** Validate `data` against `schema`, throwing with the schema's summary on mismatch. */
export function parseWith<T>(schema: (data: unknown) => T | ArkErrors, data: unknown, what: string): T {
  const result = schema(data);
  if (result instanceof ArkErrors) {
    throw new Error(`Invalid ${what}: ${result.summary}`);
  }
  return result;
}
