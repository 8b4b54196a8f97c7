import { beforeEach, afterEach, vi } from "vitest";
import { resetConfigCache } from "../utils.js";

const originalConsole = { ...console };

// Silence logger output; tests assert on the mocks
beforeEach(() => {
  console.log = vi.fn();
  console.warn = vi.fn();
  console.error = vi.fn();
  console.info = vi.fn();
});

afterEach(() => {
  Object.assign(console, originalConsole);
  vi.clearAllMocks();
  // Config is cached per process; env changes in one test must not leak
  resetConfigCache();
});
