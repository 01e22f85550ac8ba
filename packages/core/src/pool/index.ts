export * from "./connection-pool";
export * from "./pool.types";
