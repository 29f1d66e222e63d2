import { afterEach, describe, expect, it, vi } from "vitest";
import type { FastifyInstance } from "fastify";
import { buildApp } from "../../src/app.js";
import type { UrlView } from "../../src/app.js";
import { BackgroundTasks } from "../../src/background_tasks.js";
import { loadConfig } from "../../src/config.js";
import { MemoryUrlStore } from "../../src/storage_memory.js";

interface AnalyticsView {
  total_urls: number;
  total_clicks: number;
  urls: UrlView[];
}

async function createTestApp(env: Record<string, string> = {}) {
  const config = loadConfig({ BASE_URL: "https://sho.rt", LOG_LEVEL: "silent", ...env });
  const store = new MemoryUrlStore();
  const tasks = new BackgroundTasks({ error: vi.fn() });
  const app = await buildApp({ deps: { config, store, tasks }, fastifyOptions: { logger: false } });
  await app.ready();
  return { app, store, tasks };
}

async function shorten(app: FastifyInstance, url: string): Promise<UrlView> {
  const res = await app.inject({ method: "POST", url: "/api/shorten", payload: { url } });
  expect(res.statusCode).toBe(200);
  return res.json<UrlView>();
}

describe("url-service HTTP API", () => {
  let app: FastifyInstance | undefined;

  afterEach(async () => {
    if (app) await app.close();
    app = undefined;
  });

  it("creates a short url", async () => {
    const ctx = await createTestApp();
    app = ctx.app;

    const body = await shorten(app, "https://example.com/a");

    expect(body.short_code).toMatch(/^[A-Za-z0-9_-]{6}$/);
    expect(body.short_url).toBe(`https://sho.rt/${body.short_code}`);
    expect(body.original_url).toBe("https://example.com/a");
    expect(body.access_count).toBe(0);
    expect(new Date(body.created_at).toISOString()).toBe(body.created_at);
  });

  it("redirects and counts every access", async () => {
    const ctx = await createTestApp();
    app = ctx.app;
    const { short_code } = await shorten(app, "https://example.com/a");

    for (let i = 0; i < 3; i++) {
      const res = await app.inject({ method: "GET", url: `/${short_code}` });
      expect(res.statusCode).toBe(301);
      expect(res.headers.location).toBe("https://example.com/a");
    }

    expect(await ctx.tasks.drain(1000)).toBe(true);

    const res = await app.inject({ method: "GET", url: "/api/analytics" });
    expect(res.statusCode).toBe(200);
    const stats = res.json<AnalyticsView>();
    expect(stats.total_urls).toBe(1);
    expect(stats.total_clicks).toBe(3);
    expect(stats.urls).toHaveLength(1);
    expect(stats.urls[0]?.short_code).toBe(short_code);
    expect(stats.urls[0]?.access_count).toBe(3);
  });

  it("lists the most recently created url first", async () => {
    const ctx = await createTestApp();
    app = ctx.app;
    await shorten(app, "https://example.com/first");
    await shorten(app, "https://example.com/second");

    const res = await app.inject({ method: "GET", url: "/api/urls" });

    expect(res.statusCode).toBe(200);
    expect(res.json<UrlView[]>().map((u) => u.original_url)).toEqual([
      "https://example.com/second",
      "https://example.com/first"
    ]);
  });

  it("orders analytics by access count", async () => {
    const ctx = await createTestApp();
    app = ctx.app;
    const quiet = await shorten(app, "https://example.com/quiet");
    const busy = await shorten(app, "https://example.com/busy");
    await app.inject({ method: "GET", url: `/${busy.short_code}` });
    await app.inject({ method: "GET", url: `/${busy.short_code}` });
    await app.inject({ method: "GET", url: `/${quiet.short_code}` });
    await ctx.tasks.drain(1000);

    const stats = (await app.inject({ method: "GET", url: "/api/analytics" })).json<AnalyticsView>();

    expect(stats.total_clicks).toBe(3);
    expect(stats.urls.map((u) => [u.original_url, u.access_count])).toEqual([
      ["https://example.com/busy", 2],
      ["https://example.com/quiet", 1]
    ]);
  });

  it("answers 404 for an unknown code", async () => {
    const ctx = await createTestApp();
    app = ctx.app;

    const res = await app.inject({ method: "GET", url: "/nope00" });

    expect(res.statusCode).toBe(404);
    expect(res.json()).toEqual({ error: "not_found" });
    expect(ctx.tasks.pending).toBe(0);
  });

  it("rejects non-http urls before they reach the store", async () => {
    const ctx = await createTestApp();
    app = ctx.app;

    const res = await app.inject({
      method: "POST",
      url: "/api/shorten",
      payload: { url: "ftp://example.com/file" }
    });

    expect(res.statusCode).toBe(400);
    expect(res.json()).toEqual({ error: "url must start with http:// or https://" });
    expect(await ctx.store.count()).toBe(0);
  });

  it("redirects to non-ascii urls with an encoded location", async () => {
    const ctx = await createTestApp();
    app = ctx.app;
    const created = await shorten(app, "https://example.com/日本");
    expect(created.original_url).toBe("https://example.com/日本");

    const res = await app.inject({ method: "GET", url: `/${created.short_code}` });

    expect(res.statusCode).toBe(301);
    expect(res.headers.location).toBe("https://example.com/%E6%97%A5%E6%9C%AC");
  });

  it.each(["http:example.com", "https:/example.com", " https://example.com/a"])(
    "rejects %j before it reaches the store",
    async (url) => {
      const ctx = await createTestApp();
      app = ctx.app;

      const res = await app.inject({ method: "POST", url: "/api/shorten", payload: { url } });

      expect(res.statusCode).toBe(400);
      expect(res.json()).toEqual({ error: "url must start with http:// or https://" });
      expect(await ctx.store.count()).toBe(0);
    }
  );

  it("answers 404 for a long unknown code", async () => {
    const ctx = await createTestApp();
    app = ctx.app;

    const res = await app.inject({ method: "GET", url: `/${"a".repeat(65)}` });

    expect(res.statusCode).toBe(404);
    expect(res.json()).toEqual({ error: "not_found" });
  });

  it("rejects unparseable urls", async () => {
    const ctx = await createTestApp();
    app = ctx.app;

    const res = await app.inject({ method: "POST", url: "/api/shorten", payload: { url: "http://" } });

    expect(res.statusCode).toBe(400);
    expect(res.json()).toEqual({ error: "url must be a valid URL" });
  });

  it("rejects a body without url", async () => {
    const ctx = await createTestApp();
    app = ctx.app;

    const res = await app.inject({ method: "POST", url: "/api/shorten", payload: { link: "https://example.com" } });

    expect(res.statusCode).toBe(400);
    expect(res.json()).toEqual({ error: "invalid_request" });
  });

  it("sets request id, timing and cors headers", async () => {
    const ctx = await createTestApp();
    app = ctx.app;

    const res = await app.inject({
      method: "GET",
      url: "/health",
      headers: { "x-request-id": "demo-123", origin: "https://app.example.com" }
    });

    expect(res.statusCode).toBe(200);
    expect(res.headers["x-request-id"]).toBe("demo-123");
    expect(res.headers["x-process-time"]).toMatch(/^\d+\.\d{6}$/);
    expect(res.headers["access-control-allow-origin"]).toBe("*");
  });

  it("reports health and readiness", async () => {
    const ctx = await createTestApp({ APP_VERSION: "1.2.3" });
    app = ctx.app;

    const health = await app.inject({ method: "GET", url: "/health" });
    expect(health.json()).toMatchObject({ status: "ok", service: "url-service", version: "1.2.3" });

    const ready = await app.inject({ method: "GET", url: "/ready" });
    expect(ready.statusCode).toBe(200);
    expect(ready.json()).toEqual({ status: "ready" });
  });

  it("exposes prometheus metrics", async () => {
    const ctx = await createTestApp();
    app = ctx.app;
    await shorten(app, "https://example.com/a");

    const res = await app.inject({ method: "GET", url: "/metrics" });

    expect(res.statusCode).toBe(200);
    expect(res.body).toContain("# TYPE urls_created_total counter");
    expect(res.body).toContain("# TYPE background_tasks_pending gauge");
  });

  it("rate limits when enabled", async () => {
    const ctx = await createTestApp({ RATE_LIMIT_ENABLED: "true", RATE_LIMIT_MAX: "1" });
    app = ctx.app;

    expect((await app.inject({ method: "GET", url: "/health" })).statusCode).toBe(200);
    const limited = await app.inject({ method: "GET", url: "/health" });

    expect(limited.statusCode).toBe(429);
    expect(limited.json()).toEqual({ error: "rate_limited" });
  });

  it("drains pending increments and empties the store on close", async () => {
    const { app: local, store, tasks } = await createTestApp();
    const applied = vi.spyOn(store, "incrementAccess");
    const { short_code } = await shorten(local, "https://example.com/a");
    await local.inject({ method: "GET", url: `/${short_code}` });

    await local.close();

    expect(applied).toHaveBeenCalledTimes(1);
    expect(tasks.accepting).toBe(false);
    expect(await store.count()).toBe(0);
  });
});
