import {
  DEFAULT_LOBBY_PATH,
  DEFAULT_MATCH_TAG,
  DEFAULT_MAX_PUBLIC_SLOTS,
  DEFAULT_MAX_SEARCH_RESULTS,
} from "../shared/constants.js";
import { componentLogger } from "../shared/logging.js";
import type { NotificationBus } from "../session/bus.js";
import { selectByMatchTag } from "../session/config.js";
import type { SessionOrchestrator } from "../session/orchestrator.js";
import { JoinResult, type OperationEvent } from "../session/types.js";
import type { TravelGateway } from "./travel.js";

export interface SessionMenuOptions {
  orchestrator: SessionOrchestrator;
  travel: TravelGateway;
  /** Defaults to the orchestrator's bus. */
  bus?: NotificationBus;
  maxPublicSlots?: number;
  matchTag?: string;
  lobbyPath?: string;
  maxSearchResults?: number;
}

export interface MenuControls {
  host: boolean;
  join: boolean;
}

/**
 * Host/Join menu without a widget toolkit: buttons are the two entries of
 * `controls`, clicks are method calls, and every reaction is driven by the
 * orchestrator's notifications.
 */
export class SessionMenu {
  readonly controls: MenuControls = { host: true, join: true };

  private readonly orchestrator: SessionOrchestrator;
  private readonly travel: TravelGateway;
  private readonly bus: NotificationBus;
  private readonly maxPublicSlots: number;
  private readonly matchTag: string;
  private readonly lobbyPath: string;
  private readonly maxSearchResults: number;
  private readonly logger = componentLogger("menu");
  private unsubscribers: Array<() => void> = [];
  private joinInFlight: Promise<unknown> | null = null;

  constructor(options: SessionMenuOptions) {
    this.orchestrator = options.orchestrator;
    this.travel = options.travel;
    this.bus = options.bus ?? options.orchestrator.bus;
    this.maxPublicSlots = options.maxPublicSlots ?? DEFAULT_MAX_PUBLIC_SLOTS;
    this.matchTag = options.matchTag ?? DEFAULT_MATCH_TAG;
    this.lobbyPath = options.lobbyPath ?? DEFAULT_LOBBY_PATH;
    this.maxSearchResults = options.maxSearchResults ?? DEFAULT_MAX_SEARCH_RESULTS;
  }

  get isSetUp(): boolean {
    return this.unsubscribers.length > 0;
  }

  setup(): void {
    if (this.isSetUp) return;
    this.unsubscribers = [
      this.bus.subscribe("create", (e) => this.onCreateSession(e)),
      this.bus.subscribe("find", (e) => this.onFindSessions(e)),
      this.bus.subscribe("join", (e) => this.onJoinSession(e)),
      this.bus.subscribe("destroy", (e) => this.onDestroySession(e)),
      this.bus.subscribe("start", (e) => this.onStartSession(e)),
    ];
  }

  teardown(): void {
    for (const unsubscribe of this.unsubscribers) unsubscribe();
    this.unsubscribers = [];
  }

  async hostClicked(): Promise<void> {
    this.controls.host = false;
    try {
      await this.orchestrator.createSession(this.maxPublicSlots, this.matchTag);
    } catch (err) {
      this.logger.warn({ err }, "host request refused");
      this.controls.host = true;
    }
  }

  /** Search, then join the first session advertising this menu's match tag. */
  async joinClicked(): Promise<void> {
    this.controls.join = false;
    try {
      await this.orchestrator.findSessions(this.maxSearchResults);
    } catch (err) {
      this.logger.warn({ err }, "search request refused");
      this.controls.join = true;
      return;
    }
    if (this.joinInFlight) await this.joinInFlight;
  }

  private onCreateSession(event: OperationEvent<"create">): void {
    if (!event.success) {
      this.logger.warn("failed to create session");
      this.controls.host = true;
      return;
    }
    this.travel.travelToDestination(`${this.lobbyPath}?listen`);
  }

  private onFindSessions(event: OperationEvent<"find">): void {
    if (!event.success) {
      this.controls.join = true;
      return;
    }
    const match = selectByMatchTag(event.results, this.matchTag);
    if (!match) {
      this.logger.info({ matchTag: this.matchTag, found: event.results.length }, "no session with matching tag");
      this.controls.join = true;
      return;
    }
    this.joinInFlight = this.orchestrator
      .joinSession(match)
      .catch((err: unknown) => {
        this.logger.warn({ err }, "join request refused");
        this.controls.join = true;
      })
      .finally(() => {
        this.joinInFlight = null;
      });
  }

  private onJoinSession(event: OperationEvent<"join">): void {
    if (event.result !== JoinResult.Success) {
      this.logger.warn({ result: event.result }, "failed to join session");
      this.controls.join = true;
      return;
    }
    const address = this.orchestrator.getResolvedConnectAddress();
    if (!address) {
      this.logger.warn("joined session has no connect address");
      this.controls.join = true;
      return;
    }
    this.travel.connectToAddress(address);
  }

  private onDestroySession(event: OperationEvent<"destroy">): void {
    if (event.success) {
      this.controls.host = true;
      this.controls.join = true;
    }
  }

  private onStartSession(event: OperationEvent<"start">): void {
    if (!event.success) this.logger.warn("failed to start session");
  }
}
