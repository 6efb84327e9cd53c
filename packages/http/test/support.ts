import { parseAuthCoreConfig } from "@credential-core/config";
import { createInMemoryCredentialStore } from "@credential-core/store-memory";
import { createSilentLogger } from "@credential-core/telemetry";

import { createAuthCore, createAuthHandler, type ProtectedRoute } from "../src/index.js";
import type { RoleRule } from "@credential-core/policy-role";

export interface TestClock {
  current: Date;
}

export interface TestAppOptions {
  readonly config?: Record<string, unknown>;
  readonly protectedRoutes?: ReadonlyArray<ProtectedRoute>;
  readonly rules?: ReadonlyArray<RoleRule>;
  readonly clock?: TestClock;
}

export const createTestApp = async (options: TestAppOptions = {}) => {
  const clock = options.clock ?? { current: new Date("2024-01-01T00:00:00.000Z") };
  const store = createInMemoryCredentialStore();
  const config = parseAuthCoreConfig({ salt: "test-salt", signingKey: "test-secret", ...options.config });
  const core = createAuthCore({
    config,
    store,
    logger: createSilentLogger(),
    rules: options.rules,
    now: () => clock.current,
  });
  const started = await core.start();
  if (!started.ok) {
    throw new Error(`test app failed to start: ${started.error.code}`);
  }
  const handler = createAuthHandler({ core, protectedRoutes: options.protectedRoutes });
  return { clock, store, core, handler };
};

export const postJson = (path: string, body: unknown): Request =>
  new Request(`http://localhost${path}`, {
    method: "POST",
    headers: { "content-type": "application/json" },
    body: JSON.stringify(body),
  });

export const get = (path: string, authorization?: string): Request =>
  new Request(`http://localhost${path}`, {
    method: "GET",
    headers: authorization ? { authorization } : {},
  });
