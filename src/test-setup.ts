import { afterEach, vi } from 'vitest';

// Several suites drive deletion timeouts with fake timers; restore real ones even
// when a test throws before its own cleanup, and drop mock history between tests.
afterEach(() => {
  vi.useRealTimers();
  vi.clearAllMocks();
});
