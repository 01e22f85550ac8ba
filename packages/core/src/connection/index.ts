export * from "./base.connection";
export * from "./connection.types";
