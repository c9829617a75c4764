/**
 * easy-pg - Configuration
 *
 * Helper configuration schema plus loaders for environment variables and
 * postgres:// connection strings.
 */

import { z } from "zod";
import { ValidationError } from "../types/errors.js";
import { isLogLevel, logger } from "../utils/logger.js";

const log = logger.forModule("CONFIG");

const SslSchema = z.union([
  z.boolean(),
  z.object({
    ca: z.string().optional(),
    cert: z.string().optional(),
    key: z.string().optional(),
    rejectUnauthorized: z.boolean().optional(),
  }),
]);

export const DataAccessConfigSchema = z.object({
  host: z.string().min(1).default("localhost"),
  port: z.number().int().min(1).max(65535).default(5432),
  user: z.string().min(1),
  password: z.string().default(""),
  database: z.string().min(1),
  poolSize: z.number().int().positive().default(3),
  ssl: SslSchema.optional(),
  connectionTimeoutMillis: z.number().int().nonnegative().default(10000),
  idleTimeoutMillis: z.number().int().nonnegative().default(10000),
  statementTimeout: z.number().int().nonnegative().optional(),
  applicationName: z.string().min(1).optional(),
});

/** Configuration as accepted by the helper (defaults may be omitted) */
export type DataAccessConfigInput = z.input<typeof DataAccessConfigSchema>;

/** Configuration after validation, defaults applied */
export type DataAccessConfig = z.output<typeof DataAccessConfigSchema>;

/**
 * Validate a raw configuration object
 *
 * @throws ValidationError listing every failed field
 */
export function parseConfig(raw: unknown): DataAccessConfig {
  const result = DataAccessConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`,
    );
    log.error("Invalid configuration", { code: "CFG_INVALID", issues });
    throw new ValidationError(`Invalid configuration: ${issues.join("; ")}`, {
      issues,
    });
  }
  return result.data;
}

function parseInteger(value: string | undefined): number | undefined {
  if (value === undefined || value === "") return undefined;
  const parsed = parseInt(value, 10);
  return Number.isNaN(parsed) ? undefined : parsed;
}

/**
 * Parse a postgres:// connection string
 *
 * @example
 * parseConnectionString('postgres://app:pw@db:5433/shop?ssl=true')
 */
export function parseConnectionString(
  connectionString: string,
): DataAccessConfigInput {
  let url: URL;
  try {
    url = new URL(connectionString);
  } catch {
    throw new ValidationError("Invalid connection string");
  }

  if (url.protocol !== "postgres:" && url.protocol !== "postgresql:") {
    throw new ValidationError(
      `Unsupported connection string protocol: ${url.protocol}`,
    );
  }

  const config: DataAccessConfigInput = {
    host: url.hostname || "localhost",
    port: parseInt(url.port, 10) || 5432,
    user: decodeURIComponent(url.username) || "postgres",
    database: decodeURIComponent(url.pathname.slice(1)) || "postgres",
  };
  if (url.password) config.password = decodeURIComponent(url.password);

  if (
    url.searchParams.get("ssl") === "true" ||
    url.searchParams.get("sslmode") === "require"
  ) {
    config.ssl = true;
  }

  const poolSize = parseInteger(url.searchParams.get("pool_size") ?? undefined);
  if (poolSize !== undefined) config.poolSize = poolSize;

  return config;
}

/**
 * Build configuration from environment variables
 *
 * DATABASE_URL wins when set; otherwise the libpq-style PGHOST, PGPORT,
 * PGUSER, PGPASSWORD and PGDATABASE are read. PG_POOL_SIZE applies to both.
 * LOG_LEVEL, when set to a known level, also sets the logger's level.
 */
export function configFromEnv(
  env: NodeJS.ProcessEnv = process.env,
): DataAccessConfig {
  const poolSize = parseInteger(env["PG_POOL_SIZE"]);
  const connectionString = env["DATABASE_URL"];

  let raw: DataAccessConfigInput;
  if (connectionString) {
    raw = parseConnectionString(connectionString);
  } else {
    raw = {
      host: env["PGHOST"] ?? "localhost",
      port: parseInteger(env["PGPORT"]) ?? 5432,
      user: env["PGUSER"] ?? "postgres",
      database: env["PGDATABASE"] ?? "postgres",
    };
    const password = env["PGPASSWORD"];
    if (password !== undefined) raw.password = password;
  }
  if (poolSize !== undefined) raw.poolSize = poolSize;

  const logLevel = env["LOG_LEVEL"];
  if (logLevel !== undefined) {
    if (isLogLevel(logLevel)) {
      logger.setLevel(logLevel);
    } else {
      log.warn(`Ignoring unknown LOG_LEVEL: ${logLevel}`);
    }
  }

  log.debug("Loaded configuration from environment", {
    host: raw.host,
    port: raw.port,
    database: raw.database,
  });

  return parseConfig(raw);
}
