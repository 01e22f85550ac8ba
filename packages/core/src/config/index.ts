export * from "./config.types";
export * from "./env-expander";
export * from "./loader";
