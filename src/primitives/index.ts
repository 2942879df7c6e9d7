/**
 * @module primitives
 * @description Building blocks shared by the CPOR backends.
 */

export { CporEmitter } from "./base-emitter.js";
export { KeyedLock } from "./keyed-lock.js";
