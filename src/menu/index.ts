export { SessionMenu } from "./controller.js";
export type { MenuControls, SessionMenuOptions } from "./controller.js";
export { LoggingTravelGateway } from "./travel.js";
export type { TravelGateway } from "./travel.js";
