import { describe, it, expect } from "vitest";
import { SessionMenu } from "../../src/menu/controller.js";
import { LoggingTravelGateway } from "../../src/menu/travel.js";
import { LanSessionBackend } from "../../src/backends/lan.js";
import { SessionOrchestrator } from "../../src/session/orchestrator.js";
import { JoinResult } from "../../src/session/types.js";
import { createInMemoryListingStore } from "../../src/shared/listings/index.js";
import { ScriptedBackend, searchResult } from "./support/scripted-backend.js";

function setup(matchTag = "FreeForAll") {
  const backend = new ScriptedBackend();
  const orchestrator = new SessionOrchestrator({ backend, localPlayerId: "player-1" });
  const travel = new LoggingTravelGateway();
  const menu = new SessionMenu({ orchestrator, travel, matchTag });
  menu.setup();
  return { backend, orchestrator, travel, menu };
}

describe("SessionMenu host flow", () => {
  it("creates with the default slots and travels to the lobby on success", async () => {
    const { backend, travel, menu } = setup();
    const clicked = menu.hostClicked();
    expect(menu.controls.host).toBe(false);
    expect(backend.calls[0]?.config?.maxPublicSlots).toBe(4);

    backend.completeCreate(true);
    await clicked;
    expect(travel.requests).toEqual([{ type: "travel", target: "/Game/Maps/Lobby?listen" }]);
    expect(menu.controls.host).toBe(false);
  });

  it("re-enables host and stays put when create fails", async () => {
    const { backend, travel, menu } = setup();
    const clicked = menu.hostClicked();
    backend.completeCreate(false);
    await clicked;
    expect(travel.requests).toEqual([]);
    expect(menu.controls.host).toBe(true);
  });

  it("re-enables host when a create is already pending", async () => {
    const { orchestrator, menu } = setup();
    const first = orchestrator.createSession(4, "FreeForAll");
    await menu.hostClicked();
    expect(menu.controls.host).toBe(true);
    orchestrator.dispose();
    await first;
  });
});

describe("SessionMenu join flow", () => {
  it("joins the first result with the configured match tag and connects", async () => {
    const { backend, travel, menu } = setup("Deathmatch");
    const clicked = menu.joinClicked();
    expect(menu.controls.join).toBe(false);

    backend.completeFind([
      searchResult("a", "FreeForAll"),
      searchResult("b", "Deathmatch"),
      searchResult("c", "FreeForAll"),
    ]);
    expect(backend.calls[1]).toEqual({
      op: "join",
      sessionName: "GameSession",
      result: searchResult("b", "Deathmatch"),
    });

    backend.completeJoin(JoinResult.Success);
    await clicked;
    expect(travel.requests).toEqual([{ type: "connect", target: "10.0.0.5:7777" }]);
  });

  it("never travels after a failed join", async () => {
    const { backend, travel, menu } = setup();
    const clicked = menu.joinClicked();
    backend.completeFind([searchResult("a", "FreeForAll")]);
    backend.completeJoin(JoinResult.SessionIsFull);
    await clicked;
    expect(travel.requests).toEqual([]);
    expect(menu.controls.join).toBe(true);
  });

  it("does not join when no result carries the tag", async () => {
    const { backend, menu } = setup("CaptureTheFlag");
    const clicked = menu.joinClicked();
    backend.completeFind([searchResult("a", "FreeForAll")]);
    await clicked;
    expect(backend.ops()).toEqual(["find"]);
    expect(menu.controls.join).toBe(true);
  });

  it("re-enables join after an empty search", async () => {
    const { backend, menu } = setup();
    const clicked = menu.joinClicked();
    backend.completeFind([]);
    await clicked;
    expect(menu.controls.join).toBe(true);
  });

  it("re-enables join when the joined session has no address", async () => {
    const { backend, travel, menu } = setup();
    backend.connectAddress = undefined;
    const clicked = menu.joinClicked();
    backend.completeFind([searchResult("a", "FreeForAll")]);
    backend.completeJoin(JoinResult.Success);
    await clicked;
    expect(travel.requests).toEqual([]);
    expect(menu.controls.join).toBe(true);
  });
});

describe("SessionMenu lifecycle", () => {
  it("re-enables both buttons after a successful destroy", async () => {
    const { orchestrator, menu } = setup();
    menu.controls.host = false;
    menu.controls.join = false;
    await orchestrator.destroySession();
    expect(menu.controls).toEqual({ host: true, join: true });
  });

  it("stops reacting after teardown", async () => {
    const { backend, travel, menu } = setup();
    menu.teardown();
    expect(menu.isSetUp).toBe(false);
    const clicked = menu.hostClicked();
    backend.completeCreate(true);
    await clicked;
    expect(travel.requests).toEqual([]);
  });
});

describe("SessionMenu over LAN", () => {
  it("hosts a Deathmatch lobby and lets a second player connect to it", async () => {
    const directory = createInMemoryListingStore();
    const hostOrchestrator = new SessionOrchestrator({
      backend: new LanSessionBackend({ directory, playerAddress: "192.168.1.10:7777" }),
      localPlayerId: "host",
    });
    const clientOrchestrator = new SessionOrchestrator({
      backend: new LanSessionBackend({ directory, playerAddress: "192.168.1.20:7777" }),
      localPlayerId: "client",
    });
    const hostTravel = new LoggingTravelGateway();
    const clientTravel = new LoggingTravelGateway();
    const hostMenu = new SessionMenu({
      orchestrator: hostOrchestrator,
      travel: hostTravel,
      maxPublicSlots: 8,
      matchTag: "Deathmatch",
    });
    const clientMenu = new SessionMenu({ orchestrator: clientOrchestrator, travel: clientTravel, matchTag: "Deathmatch" });
    hostMenu.setup();
    clientMenu.setup();

    await hostMenu.hostClicked();
    expect(hostOrchestrator.lastSessionConfig?.advertisingMode).toBe("lan");
    expect(hostOrchestrator.lastSessionConfig?.maxPublicSlots).toBe(8);
    expect(hostTravel.requests).toEqual([{ type: "travel", target: "/Game/Maps/Lobby?listen" }]);

    await clientMenu.joinClicked();
    expect(clientOrchestrator.lastSearchQuery).toEqual({ maxResults: 10_000, lanOnly: true, lobbiesOnly: true });
    expect(clientTravel.requests).toEqual([{ type: "connect", target: "192.168.1.10:7777" }]);
  });
});
