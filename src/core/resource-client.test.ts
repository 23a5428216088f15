import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { z } from "zod";
import { FakeSessionProvider } from "../testing/fake-session-provider.js";
import { noopLogger } from "../utils/noop-logger.js";
import { makeCacheKey } from "./cache-keys.js";
import { type Callguard, createCallguard } from "./callguard.js";
import { type ReadOptions, ResourceClient } from "./resource-client.js";

const alarmSchema = z.object({ id: z.string(), time: z.string() });

class AlarmClient extends ResourceClient {
  constructor(guard: Callguard) {
    super({
      dispatcher: guard.dispatcher,
      request: guard.request,
      family: "alarm",
      resourcePath: "/api/alarms",
    });
  }

  list(options?: ReadOptions) {
    return this.read("list", "/api/alarms", z.array(alarmSchema), options);
  }

  create(time: string) {
    return this.mutate(
      "create",
      { method: "POST", path: "/api/alarms", body: { time } },
      alarmSchema,
    );
  }
}

const ALARMS = JSON.stringify([{ id: "a1", time: "07:00" }]);

describe("ResourceClient", () => {
  let session: FakeSessionProvider;
  let guard: Callguard;
  let alarms: AlarmClient;

  beforeEach(() => {
    session = new FakeSessionProvider();
    guard = createCallguard({
      session,
      baseUrl: "https://remote.test",
      logger: noopLogger,
      config: { retry: { maxAttempts: 1 } },
    });
    guard.connection.fire("session_restored");
    alarms = new AlarmClient(guard);
  });

  afterEach(() => {
    guard.dispose();
  });

  describe("read", () => {
    it("fetches once and then serves from the cache", async () => {
      session.reply({ body: ALARMS });

      const first = await alarms.list();
      const second = await alarms.list();

      expect(first).toEqual({ ok: true, value: [{ id: "a1", time: "07:00" }], source: "live" });
      expect(second).toEqual({ ok: true, value: [{ id: "a1", time: "07:00" }], source: "cache" });
      expect(session.requests).toHaveLength(1);
      expect(session.requests[0]).toMatchObject({
        method: "GET",
        url: "https://remote.test/api/alarms",
      });
    });

    it("caches under the key built from the path and query", async () => {
      session.reply({ body: ALARMS });
      await alarms.list({ query: { limit: 5 } });

      expect(session.requests[0]?.url).toBe("https://remote.test/api/alarms?limit=5");
      expect((await guard.cache.get(makeCacheKey("/api/alarms", { limit: 5 }))).hit).toBe(true);
      expect((await guard.cache.get(makeCacheKey("/api/alarms"))).hit).toBe(false);
    });

    it("uses one breaker per operation under the resource family", async () => {
      await alarms.list();
      expect(guard.breakers.get("alarm:list")).toBeDefined();
      expect(guard.breakers.settingsFor("alarm:list")).toEqual({
        failureThreshold: 3,
        recoveryTimeoutMs: 30000,
      });
    });

    it("rejects a live response that does not match the schema, without caching it", async () => {
      session.reply({ body: JSON.stringify([{ id: 7 }]) });

      const outcome = await alarms.list();

      expect(outcome.ok).toBe(false);
      expect(!outcome.ok && outcome.error.kind).toBe("permanent");
      expect((await guard.cache.get(makeCacheKey("/api/alarms"))).hit).toBe(false);
    });

    it("treats a cached value that no longer matches the schema as a miss", async () => {
      await guard.cache.put(makeCacheKey("/api/alarms"), "not a list", {
        tier: "volatile",
        volatileTtlMs: 60000,
      });
      session.reply({ body: ALARMS });

      const outcome = await alarms.list();

      expect(outcome).toMatchObject({ ok: true, source: "live" });
      expect(session.requests).toHaveLength(1);
    });

    it("bypasses the cache when forced", async () => {
      session.reply({ body: ALARMS }, { body: "[]" });
      await alarms.list();

      const refreshed = await alarms.list({ forceRefresh: true });

      expect(refreshed).toEqual({ ok: true, value: [], source: "live" });
      expect(session.requests).toHaveLength(2);
    });
  });

  describe("mutate", () => {
    it("sends the anti-forgery token and the JSON body", async () => {
      session.reply({ body: JSON.stringify({ id: "a2", time: "08:00" }) });

      const outcome = await alarms.create("08:00");

      expect(outcome).toEqual({ ok: true, value: { id: "a2", time: "08:00" }, source: "live" });
      expect(session.requests[0]).toMatchObject({
        method: "POST",
        url: "https://remote.test/api/alarms",
        body: '{"time":"08:00"}',
      });
      expect(session.requests[0]?.headers.csrf).toBe("test-anti-forgery-token");
    });

    it("drops the family's cached reads on success", async () => {
      session.reply(
        { body: ALARMS },
        { body: ALARMS },
        { body: JSON.stringify({ id: "a2", time: "08:00" }) },
        { body: "[]" },
      );
      await alarms.list({ query: { limit: 5 } });
      await alarms.list();

      await alarms.create("08:00");
      const after = await alarms.list();

      expect(after).toEqual({ ok: true, value: [], source: "live" });
      expect((await guard.cache.get(makeCacheKey("/api/alarms", { limit: 5 }))).hit).toBe(false);
    });

    it("keeps cached reads when the mutation fails", async () => {
      session.reply({ body: ALARMS }, { status: 400, body: '{"message":"bad time"}' });
      await alarms.list();

      const outcome = await alarms.create("25:00");

      expect(!outcome.ok && outcome.error.kind).toBe("permanent");
      expect(await alarms.list()).toMatchObject({ ok: true, source: "cache" });
    });
  });
});
