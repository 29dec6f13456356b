import { createSessionBackend } from "../backends/index.js";
import type { MatchlinkSettings } from "../config.js";
import { createInMemoryListingStore, type ListingStore } from "../shared/listings/index.js";
import { SessionMenu } from "../menu/controller.js";
import { LoggingTravelGateway } from "../menu/travel.js";
import type { SessionBackend } from "../session/backend.js";
import { SessionOrchestrator } from "../session/orchestrator.js";

export interface SessionRuntime {
  backend: SessionBackend;
  orchestrator: SessionOrchestrator;
  menu: SessionMenu;
  travel: LoggingTravelGateway;
}

/** Wire one player's backend, orchestrator and menu from resolved settings. */
export function createRuntime(
  settings: MatchlinkSettings,
  lanDirectory: ListingStore = createInMemoryListingStore()
): SessionRuntime {
  const backend =
    settings.backend === "lan"
      ? createSessionBackend({ kind: "lan", directory: lanDirectory, playerAddress: settings.playerAddress })
      : createSessionBackend({
          kind: "hosted",
          hubUrl: settings.hubUrl,
          token: settings.hubToken,
          playerAddress: settings.playerAddress,
        });
  const orchestrator = new SessionOrchestrator({ backend, localPlayerId: settings.playerId });
  const travel = new LoggingTravelGateway();
  const menu = new SessionMenu({
    orchestrator,
    travel,
    maxPublicSlots: settings.maxPublicSlots,
    matchTag: settings.matchTag,
    lobbyPath: settings.lobbyPath,
  });
  menu.setup();
  return { backend, orchestrator, menu, travel };
}
