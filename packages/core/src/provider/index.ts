export * from "./base.provider";
export * from "./provider-registry";
export * from "./provider.types";
