/**
 * Per-environment starting points. Anything not named here takes the
 * schema default.
 */

import type { CporConfigInput, Environment } from "./schema.js";

export const ENVIRONMENT_PRESETS: Readonly<Record<Environment, CporConfigInput>> = {
  development: {
    debug: true,
    network: { host: "localhost", port: 8443 },
    security: { requireTls: false, enableAuthentication: false },
    logging: { level: "DEBUG" },
  },
  testing: {
    debug: true,
    network: { host: "127.0.0.1", port: 9443 },
    security: { requireTls: false, enableAuthentication: false },
    logging: { level: "DEBUG" },
  },
  staging: {
    debug: false,
  },
  production: {
    debug: false,
    security: { requireTls: true, enableAuthentication: true },
    logging: { level: "WARNING" },
  },
};
