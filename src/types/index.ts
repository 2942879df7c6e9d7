/**
 * @module types
 * @description Public type exports for the CPOR core.
 */

export * from "./branded.js";
export * from "./keys.js";
export * from "./events.js";
