import { randomUUID } from "node:crypto";
import fastify, { type FastifyBaseLogger, type FastifyRequest } from "fastify";
import helmet from "@fastify/helmet";
import cors from "@fastify/cors";
import sensible from "@fastify/sensible";
import type { AppConfig } from "@tollgate/shared";
import { loggerOptions } from "@tollgate/shared";
import { createPool, type Pool } from "./db/pool.js";
import { registerAdmissionGate } from "./plugins/admission-gate.js";
import { createRedisClient } from "./redis/client.js";
import { RedisScriptManager } from "./redis/scripts.js";
import { registerAdminRoutes } from "./routes/admin.js";
import { registerAdmissionRoutes } from "./routes/admission.js";
import { registerHealthRoutes } from "./routes/health.js";
import { registerMetricsRoutes } from "./routes/metrics.js";
import { AdmissionService } from "./services/admission.js";
import { WindowCompactor } from "./services/compaction.js";
import { MetricsService } from "./services/metrics.js";
import { PlanCatalog } from "./services/plan-catalog.js";
import { PlanResolver } from "./services/plan-resolver.js";
import { QuotaResolver } from "./services/quota-resolver.js";
import { StandingEvents, type StandingNotifier } from "./services/standing.js";
import { StoreGuard } from "./services/store-guard.js";
import { ViolationRecorder } from "./services/violation-recorder.js";
import {
  BillingEvents,
  InMemoryBillingDirectory,
  PostgresBillingDirectory,
  type BillingDirectory
} from "./stores/billing-directory.js";
import { InMemoryQuotaStore, PostgresQuotaStore, type QuotaStore } from "./stores/quota-store.js";
import { RedisWindowStore } from "./stores/redis-window-store.js";
import { InMemoryViolationStore, PostgresViolationStore, type ViolationStore } from "./stores/violation-store.js";
import { InMemoryWindowStore, type WindowStore } from "./stores/window-store.js";
import type { RequestPrincipal } from "./types/fastify.js";

export interface AppOverrides {
  windowStore?: WindowStore;
  quotaStore?: QuotaStore;
  violationStore?: ViolationStore;
  billingDirectory?: BillingDirectory;
  catalog?: PlanCatalog;
  notifier?: StandingNotifier;
  resolvePrincipal?: (request: FastifyRequest) => RequestPrincipal | null;
  clock?: () => number;
}

export async function buildApp(config: AppConfig, overrides: AppOverrides = {}) {
  const app = fastify({ logger: loggerOptions(config.LOG_LEVEL) });

  await app.register(helmet);
  await app.register(cors, { origin: true });
  await app.register(sensible);

  app.decorateRequest("correlationId", "");
  app.addHook("onRequest", async (request, reply) => {
    const headerValue = request.headers["x-correlation-id"];
    const correlationId = typeof headerValue === "string" && headerValue.length > 0 ? headerValue : randomUUID();
    request.correlationId = correlationId;
    reply.header("x-correlation-id", correlationId);
  });

  const clock = overrides.clock ?? Date.now;
  const catalog = overrides.catalog ?? (await PlanCatalog.fromFile(config.LIMITS_CONFIG_PATH));
  const metrics = new MetricsService();

  const windows = overrides.windowStore ?? (await createWindowStore(config, app.log));

  let pool: Pool | null = null;
  if (config.ENABLE_PG && config.DATABASE_URL) {
    pool = createPool(config.DATABASE_URL, app.log);
  }

  const quotaStore = overrides.quotaStore ?? (pool ? new PostgresQuotaStore(pool, app.log) : new InMemoryQuotaStore());
  const violationStore =
    overrides.violationStore ?? (pool ? new PostgresViolationStore(pool, app.log) : new InMemoryViolationStore());
  const billingDirectory =
    overrides.billingDirectory ?? (pool ? new PostgresBillingDirectory(pool, app.log) : new InMemoryBillingDirectory());

  try {
    await quotaStore.init();
    await violationStore.init();
    await billingDirectory.init();
  } catch (error) {
    await Promise.all([app.close(), windows.close(), quotaStore.close(), violationStore.close()]);
    if (pool) {
      await pool.end();
    }
    throw error;
  }

  // The directory replica must see a plan change before the resolver re-caches it.
  const billingEvents = new BillingEvents();
  if (billingDirectory instanceof InMemoryBillingDirectory) {
    billingDirectory.subscribe(billingEvents);
  }
  const plans = new PlanResolver(billingDirectory, config.PLAN_CACHE_TTL_MS, metrics, app.log);
  plans.subscribe(billingEvents);

  const standing = new StandingEvents(app.log);
  const notifier = overrides.notifier ?? standing;
  const violations = new ViolationRecorder(violationStore, metrics, app.log);
  const quotas = new QuotaResolver({ store: quotaStore, plans, catalog, violations, notifier, logger: app.log });
  const guard = new StoreGuard(config.STORE_FAILURE_POLICY, config.STORE_TIMEOUT_MS, metrics, app.log);

  const admission = new AdmissionService({
    windows,
    guard,
    catalog,
    quotas,
    violations,
    notifier,
    metrics,
    logger: app.log,
    settings: {
      ipLimit: config.IP_LIMIT_PER_WINDOW,
      windowSeconds: config.RATE_WINDOW_SECONDS,
      upgradeUrl: config.UPGRADE_URL
    },
    clock
  });

  const compactor = new WindowCompactor(
    windows,
    violations,
    metrics,
    app.log,
    {
      intervalMs: config.COMPACTION_INTERVAL_MS,
      graceSeconds: config.WINDOW_GRACE_SECONDS,
      violationRetentionDays: config.VIOLATION_RETENTION_DAYS
    },
    clock
  );

  registerAdmissionGate(app, { admission, resolvePrincipal: overrides.resolvePrincipal });

  await registerHealthRoutes(app, {
    windows,
    stores: {
      quotas: () => quotaStore.healthcheck(),
      violations: () => violationStore.healthcheck()
    }
  });
  await registerAdmissionRoutes(app, admission);
  await registerAdminRoutes(app, {
    token: config.ADMIN_TOKEN,
    violations,
    quotas,
    catalog,
    billingEvents,
    windows,
    clock
  });
  await registerMetricsRoutes(app, metrics);

  compactor.start();

  return {
    app,
    services: {
      admission,
      billingEvents,
      catalog,
      compactor,
      metrics,
      plans,
      quotas,
      standing,
      violations,
      windows
    },
    close: async () => {
      compactor.stop();
      await app.close();
      await violations.flush();
      await Promise.all([windows.close(), quotaStore.close(), violationStore.close()]);
      if (pool) {
        await pool.end();
      }
    }
  };
}

async function createWindowStore(config: AppConfig, logger: FastifyBaseLogger): Promise<WindowStore> {
  if (config.WINDOW_STORE === "memory") {
    return new InMemoryWindowStore();
  }

  const redis = createRedisClient(config.REDIS_URL, logger);
  await redis.connect();
  const scripts = new RedisScriptManager(redis);
  await scripts.loadScripts();
  return new RedisWindowStore({ redis, scripts, graceSeconds: config.WINDOW_GRACE_SECONDS });
}
