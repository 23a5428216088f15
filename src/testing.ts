/**
 * Public test utilities: exported from the `"callguard/testing"` entry point.
 * Consumers can import these helpers to test code built on callguard without a
 * remote service or a disk.
 */
export { MemoryCacheStorage } from "./adapters/memory-cache-storage.js";
export type { ScriptedReply } from "./testing/fake-session-provider.js";
export { FakeSessionProvider } from "./testing/fake-session-provider.js";
export { NoopLogger, noopLogger } from "./utils/noop-logger.js";
