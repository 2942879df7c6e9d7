/**
 * @module messages
 * @description CPOR-2 message kinds, construction, wire conversion,
 * dispatch and signing.
 */

export * from "./errors.js";
export * from "./schema.js";
export * from "./registry.js";
export * from "./legacy.js";
export * from "./parse.js";
export * from "./signing.js";
