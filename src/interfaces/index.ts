/**
 * @module interfaces
 * @description Public interface exports for the CPOR core.
 */

export * from "./event-emitter.js";
export * from "./crypto-manager.js";
export * from "./secure-storage.js";
