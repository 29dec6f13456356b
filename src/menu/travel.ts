import { componentLogger } from "../shared/logging.js";

/** Boundary to the host application's map travel / connect mechanism. */
export interface TravelGateway {
  /** Host side: load the shared destination (e.g. "/Game/Maps/Lobby?listen"). */
  travelToDestination(path: string): void;
  /** Client side: connect to the address resolved by a successful join. */
  connectToAddress(address: string): void;
}

/** Gateway that only records the request; used by the CLI, which has no map to load. */
export class LoggingTravelGateway implements TravelGateway {
  private readonly logger = componentLogger("travel");
  readonly requests: Array<{ type: "travel" | "connect"; target: string }> = [];

  travelToDestination(path: string): void {
    this.requests.push({ type: "travel", target: path });
    this.logger.info({ path }, "travel to destination requested");
  }

  connectToAddress(address: string): void {
    this.requests.push({ type: "connect", target: address });
    this.logger.info({ address }, "connect to session host requested");
  }
}
