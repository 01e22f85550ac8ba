export * from "./connection-manager";
export * from "./manager.types";
