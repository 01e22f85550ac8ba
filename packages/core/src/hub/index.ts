export * from "./connection-hub";
