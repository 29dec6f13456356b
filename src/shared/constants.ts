/** Well-known name of the session this host creates, joins and tears down. */
export const GAME_SESSION_NAME = "GameSession";

/** Backend identity of the local/LAN provider. Any other identity is treated as hosted. */
export const LAN_BACKEND_IDENTITY = "NULL";
export const HOSTED_BACKEND_IDENTITY = "HOSTED";

export const DEFAULT_HUB_LISTEN = "127.0.0.1:7350";
export const DEFAULT_PLAYER_ADDRESS = "127.0.0.1:7777";

export const DEFAULT_MAX_PUBLIC_SLOTS = 4;
export const DEFAULT_MATCH_TAG = "FreeForAll";
export const DEFAULT_LOBBY_PATH = "/Game/Maps/Lobby";
export const DEFAULT_MAX_SEARCH_RESULTS = 10_000;

export const VERSION = "0.1.0";
