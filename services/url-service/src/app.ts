import Fastify from "fastify";
import type { FastifyError, FastifyInstance, FastifyServerOptions } from "fastify";
import cors from "@fastify/cors";
import helmet from "@fastify/helmet";
import rateLimit from "@fastify/rate-limit";
import { BackgroundTasks } from "./background_tasks.js";
import type { Config } from "./config.js";
import { observeHttpRequest, redirectsTotal, registry, urlsCreatedTotal } from "./metrics.js";
import { getOrCreateRequestId, REQUEST_ID_HEADER } from "./request_id.js";
import { createShortenerService } from "./shortener.js";
import type { ShortenerService } from "./shortener.js";
import type { UrlRecord, UrlStore } from "./storage.js";
import { toLocationHeader, validateHttpUrl } from "./validate_url.js";

export interface AppDeps {
  config: Config;
  store: UrlStore;
  /** Defaults to a context that logs through the app logger. */
  tasks?: BackgroundTasks;
}

export interface AppOptions {
  deps: AppDeps;
  fastifyOptions?: FastifyServerOptions;
}

export interface UrlView {
  original_url: string;
  short_code: string;
  short_url: string;
  created_at: string;
  access_count: number;
}

const errorSchema = {
  type: "object",
  properties: { error: { type: "string" } }
} as const;

const urlViewSchema = {
  type: "object",
  properties: {
    original_url: { type: "string" },
    short_code: { type: "string" },
    short_url: { type: "string" },
    created_at: { type: "string" },
    access_count: { type: "integer" }
  }
} as const;

function toView(shortener: ShortenerService, rec: UrlRecord): UrlView {
  return {
    original_url: rec.originalUrl,
    short_code: rec.shortCode,
    short_url: shortener.shortUrlFor(rec),
    created_at: rec.createdAt.toISOString(),
    access_count: rec.accessCount
  };
}

/**
 * Wires the shortener routes onto a Fastify instance. Closing the app drains
 * pending access increments (bounded by `shutdownDrainMs`) and closes the store.
 */
export async function buildApp(options: AppOptions): Promise<FastifyInstance> {
  const { config, store } = options.deps;

  const app = Fastify({
    logger: {
      level: config.logLevel
    },
    bodyLimit: config.bodyLimitBytes,
    trustProxy: true,
    genReqId: (req) => getOrCreateRequestId(req.headers),
    ...options.fastifyOptions
  });

  const tasks = options.deps.tasks ?? new BackgroundTasks(app.log);
  const shortener = createShortenerService({ store, tasks, baseUrl: config.baseUrl });

  const buildInfo = {
    service: "url-service",
    version: config.appVersion,
    commit: config.gitSha,
    env: config.appEnv,
    started_at: new Date().toISOString()
  };

  app.addHook("onRequest", async (req, reply) => {
    reply.header(REQUEST_ID_HEADER, req.id);
  });

  app.addHook("onSend", async (_req, reply) => {
    reply.header("X-Process-Time", (reply.elapsedTime / 1000).toFixed(6));
  });

  app.addHook("onResponse", async (req, reply) => {
    observeHttpRequest(req.method, req.routeOptions.url, reply.statusCode, reply.elapsedTime);
  });

  app.addHook("onClose", async () => {
    const drained = await shortener.close(config.shutdownDrainMs);
    if (!drained) {
      app.log.warn({ pending: tasks.pending }, "closed with access increments still pending");
    }
  });

  await app.register(cors, { origin: "*" });

  await app.register(helmet, {
    contentSecurityPolicy: false
  });

  if (config.rateLimitEnabled) {
    await app.register(rateLimit, {
      max: config.rateLimitMax,
      timeWindow: config.rateLimitTimeWindowMs
    });
  }

  app.get("/health", async () => {
    return { status: "ok", ...buildInfo };
  });

  app.get("/ready", async () => {
    await store.ping();
    return { status: "ready" };
  });

  app.get("/metrics", async (_req, reply) => {
    try {
      const metrics = await registry.metrics();
      reply.header("Content-Type", registry.contentType).code(200).send(metrics);
    } catch (err) {
      app.log.error({ err }, "metrics failed");
      reply.code(500).send("metrics_error");
    }
  });

  app.post<{ Body: { url: string } }>(
    "/api/shorten",
    {
      schema: {
        body: {
          type: "object",
          required: ["url"],
          properties: {
            url: { type: "string", minLength: 1, maxLength: 2048 }
          }
        },
        response: {
          200: urlViewSchema,
          400: errorSchema,
          500: errorSchema
        }
      }
    },
    async (req, reply) => {
      const res = validateHttpUrl(req.body.url);
      if (!res.ok) {
        return reply.code(400).send({ error: res.error });
      }

      const startedAt = process.hrtime.bigint();
      const rec = await shortener.shorten(req.body.url);
      req.log.debug(
        { shortCode: rec.shortCode, elapsedMs: Number(process.hrtime.bigint() - startedAt) / 1e6 },
        "short url created"
      );
      urlsCreatedTotal.inc();

      return reply.send(toView(shortener, rec));
    }
  );

  app.get(
    "/api/urls",
    {
      schema: {
        response: {
          200: { type: "array", items: urlViewSchema }
        }
      }
    },
    async () => {
      const urls = await shortener.list();
      return urls.map((rec) => toView(shortener, rec));
    }
  );

  app.get(
    "/api/analytics",
    {
      schema: {
        response: {
          200: {
            type: "object",
            properties: {
              total_urls: { type: "integer" },
              total_clicks: { type: "integer" },
              urls: { type: "array", items: urlViewSchema }
            }
          }
        }
      }
    },
    async () => {
      const stats = await shortener.analytics();
      return {
        total_urls: stats.totalUrls,
        total_clicks: stats.totalClicks,
        urls: stats.urls.map((rec) => toView(shortener, rec))
      };
    }
  );

  app.get<{ Params: { code: string } }>(
    "/:code",
    {
      schema: {
        params: {
          type: "object",
          required: ["code"],
          properties: { code: { type: "string", minLength: 1 } }
        },
        response: {
          404: errorSchema
        }
      }
    },
    async (req, reply) => {
      const rec = await shortener.resolve(req.params.code);
      if (!rec) {
        redirectsTotal.inc({ result: "miss" });
        return reply.code(404).send({ error: "not_found" });
      }

      redirectsTotal.inc({ result: "hit" });
      return reply.redirect(toLocationHeader(rec.originalUrl), 301);
    }
  );

  app.setNotFoundHandler(async (_req, reply) => {
    return reply.code(404).send({ error: "not_found" });
  });

  app.setErrorHandler((err: FastifyError, req, reply) => {
    const statusCode = err.statusCode ?? 500;

    if (statusCode >= 500) {
      app.log.error({ err }, "request failed");
    } else {
      req.log.info({ err }, "request rejected");
    }

    const error =
      statusCode === 429 ? "rate_limited" : statusCode < 500 ? "invalid_request" : "internal_error";
    return reply.code(statusCode).send({ error });
  });

  return app;
}
