import { vi } from "vitest";
import type { Logger } from "../src/utils/logger.js";

/** A logger whose calls are recorded instead of printed. */
export function createSilentLogger(): Logger {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
}

export function filledBytes(length: number, value: number): Uint8Array {
  return new Uint8Array(length).fill(value);
}
