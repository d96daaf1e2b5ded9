import { afterEach, vi } from "vitest";

// Renderer and host suites stub `requestAnimationFrame`, `ResizeObserver` and canvas
// contexts. Undo them after each test so later suites never inherit a stub.
afterEach(() => {
  vi.unstubAllGlobals();
  vi.restoreAllMocks();
});
