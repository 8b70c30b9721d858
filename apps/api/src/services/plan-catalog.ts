import { readFile } from "node:fs/promises";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import {
  ConfigurationError,
  UNLIMITED,
  type Limit,
  type LimitsCatalog,
  type PlanTier,
  type ResourceType,
  type Role
} from "@tollgate/shared";

export const DEFAULT_LIMITS_PATH = fileURLToPath(new URL("../../config/limits.json", import.meta.url));

const limitSchema = z.union([z.number().int().nonnegative(), z.literal(UNLIMITED)]);

// .strict() turns an unknown plan, role or resource key into a startup error
// instead of a silently ignored entry.
const resourceLimitsSchema = z
  .object({
    calculations: limitSchema,
    comparisons: limitSchema
  })
  .strict();

const catalogSchema = z
  .object({
    roles: z
      .object({
        viewer: limitSchema,
        user: limitSchema,
        admin: limitSchema,
        superadmin: limitSchema
      })
      .strict(),
    plans: z
      .object({
        free: resourceLimitsSchema,
        pro: resourceLimitsSchema,
        enterprise: resourceLimitsSchema
      })
      .strict()
  })
  .strict() satisfies z.ZodType<LimitsCatalog>;

function deepFreeze(catalog: LimitsCatalog): LimitsCatalog {
  Object.freeze(catalog.roles);
  for (const limits of Object.values(catalog.plans)) {
    Object.freeze(limits);
  }
  Object.freeze(catalog.plans);
  return Object.freeze(catalog);
}

export function parseLimitsCatalog(data: unknown, source: string): LimitsCatalog {
  const parsed = catalogSchema.safeParse(data);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`);
    throw new ConfigurationError(`Invalid limits catalog ${source}: ${issues.join("; ")}`);
  }
  return deepFreeze(parsed.data);
}

/**
 * Immutable (plan x resource) and (role) limit table. A reload validates the
 * new file completely before swapping the snapshot; a bad file leaves the
 * current table in place.
 */
export class PlanCatalog {
  private snapshot: LimitsCatalog;
  private loadedAt: string;

  private constructor(
    catalog: LimitsCatalog,
    private readonly source: string | null
  ) {
    this.snapshot = catalog;
    this.loadedAt = new Date().toISOString();
  }

  static async fromFile(path: string = DEFAULT_LIMITS_PATH): Promise<PlanCatalog> {
    return new PlanCatalog(await readCatalogFile(path), path);
  }

  static fromData(data: unknown): PlanCatalog {
    return new PlanCatalog(parseLimitsCatalog(data, "<inline>"), null);
  }

  async reload(): Promise<LimitsCatalog> {
    if (this.source === null) {
      throw new ConfigurationError("Limits catalog was built inline and has no file to reload");
    }
    this.snapshot = await readCatalogFile(this.source);
    this.loadedAt = new Date().toISOString();
    return this.snapshot;
  }

  planLimit(plan: PlanTier, resourceType: ResourceType): Limit {
    return this.snapshot.plans[plan][resourceType];
  }

  roleLimit(role: Role): Limit {
    return this.snapshot.roles[role];
  }

  describe(): { source: string | null; loadedAt: string; catalog: LimitsCatalog } {
    return { source: this.source, loadedAt: this.loadedAt, catalog: this.snapshot };
  }
}

async function readCatalogFile(path: string): Promise<LimitsCatalog> {
  let raw: string;
  try {
    raw = await readFile(path, "utf8");
  } catch (error) {
    throw new ConfigurationError(`Cannot read limits catalog ${path}: ${error instanceof Error ? error.message : String(error)}`);
  }

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (error) {
    throw new ConfigurationError(`Limits catalog ${path} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }

  return parseLimitsCatalog(data, path);
}
