/**
 * Vitest Global Setup
 *
 * Resets the config and adapter caches before each test so vi.stubEnv()
 * calls are picked up on the next getConfig().
 *
 * The modules are imported lazily inside the hooks so that a test file's
 * vi.mock() of an SDK is registered before the adapters load it.
 */

import { beforeAll, beforeEach } from "vitest";

async function resetCaches(): Promise<void> {
  const { _resetConfigCache } = await import("./src/config/index.js");
  const { resetAdapterCache } = await import("./src/adapters/llm/router.js");
  _resetConfigCache();
  resetAdapterCache();
}

beforeAll(async () => {
  await resetCaches();
});

beforeEach(async () => {
  await resetCaches();
});
