export * from "./types/action.types";
export * from "./types/agent.types";
export * from "./utils/coordinates.utils";
export * from "./utils/action.utils";
export * from "./config/calibration";
