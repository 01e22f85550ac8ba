export { AsyncLock } from "./async-lock";
export { KeyedLock } from "./keyed-lock";
