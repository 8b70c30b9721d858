import type { FastifyInstance } from "fastify";
import type { WindowStore } from "../stores/window-store.js";

interface HealthDeps {
  windows: WindowStore;
  /** Named readiness checks for the persistent stores, e.g. `{ quotas: () => store.healthcheck() }`. */
  stores: Record<string, () => Promise<boolean>>;
}

export async function registerHealthRoutes(fastify: FastifyInstance, deps: HealthDeps): Promise<void> {
  fastify.get("/health", async () => ({ status: "ok", service: "tollgate" }));

  fastify.get("/ready", async (_request, reply) => {
    const readiness = Object.entries({ windows: () => deps.windows.healthcheck(), ...deps.stores });
    const results = await Promise.all(
      readiness.map(async ([name, check]) => [name, await check().catch(() => false)] as const)
    );

    const checks = Object.fromEntries(results);
    const ready = results.every(([, ok]) => ok);
    if (!ready) {
      reply.status(503);
    }

    return {
      status: ready ? "ready" : "degraded",
      backend: deps.windows.backend,
      checks
    };
  });
}
