export * from "./health.observer";
export * from "./logging.observer";
export * from "./metrics.observer";
export * from "./observer.types";
