import { readFileSync, existsSync } from "node:fs";
import path from "node:path";
import * as z from "zod";
import { ConfigError, describeError } from "../workflow/errors.js";

export const PROJECT_ROOT = path.resolve(__dirname, "../..");

const SessionStoreKindSchema = z.enum(["memory", "file", "supabase"]);

export const AppConfigSchema = z.object({
  /** Graph file, relative to the project root or absolute. */
  graph: z.string().min(1).optional(),
  /** Name of a graph under graphs/<flowId>.flow.yaml; ignored when `graph` is set. */
  flowId: z.string().min(1).optional(),
  port: z.number().int().min(0).max(65535).optional(),
  sessionStore: SessionStoreKindSchema.optional(),
  sessionDir: z.string().min(1).optional(),
  sessionTable: z.string().min(1).optional(),
  capabilityTimeoutMs: z.number().int().positive().optional(),
  storeTimeoutMs: z.number().int().positive().optional(),
  storeRetries: z.number().int().min(1).optional(),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;

export interface ResolvedAppConfig {
  flowPath: string;
  port: number;
  sessionStore: z.infer<typeof SessionStoreKindSchema>;
  sessionDir: string;
  sessionTable: string;
  capabilityTimeoutMs: number;
  storeTimeoutMs: number;
  storeRetries: number;
}

export const DEFAULT_FLOW_ID = "project-clarifier";

const EnvSchema = z.object({
  FLOW_PATH: z.string().min(1).optional(),
  PORT: z.coerce.number().int().min(0).max(65535).optional(),
  SESSION_STORE: SessionStoreKindSchema.optional(),
  SESSION_DIR: z.string().min(1).optional(),
  CAPABILITY_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
  STORE_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
  STORE_RETRIES: z.coerce.number().int().min(1).optional(),
});

function fromRoot(target: string): string {
  return path.isAbsolute(target) ? target : path.resolve(PROJECT_ROOT, target);
}

/**
 * Resolve the path to app.config.json.
 * Priority: APP_CONFIG_PATH env > <project root>/app.config.json
 */
export function getAppConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  const explicitPath = env.APP_CONFIG_PATH;
  return explicitPath ? fromRoot(explicitPath) : path.join(PROJECT_ROOT, "app.config.json");
}

/**
 * Load and validate app.config.json.
 * Returns null if the file does not exist; a malformed file is a ConfigError.
 */
export function loadAppConfig(env: NodeJS.ProcessEnv = process.env): AppConfig | null {
  const configPath = getAppConfigPath(env);
  if (!existsSync(configPath)) return null;

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(configPath, "utf-8"));
  } catch (error) {
    throw new ConfigError(`App config ${configPath} is not valid JSON: ${describeError(error)}`, [], { cause: error });
  }
  const parsed = AppConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`);
    throw new ConfigError(`App config ${configPath} is invalid: ${issues[0]}`, issues);
  }
  return parsed.data;
}

/**
 * Resolve flow path from flowId.
 * Path: graphs/<flowId>.flow.yaml
 */
export function getFlowPath(flowId: string): string {
  return path.join(PROJECT_ROOT, "graphs", `${flowId}.flow.yaml`);
}

/**
 * Validate that the flow file exists.
 * Throws with clear error message if validation fails.
 */
export function validateAppConfig(config: ResolvedAppConfig): void {
  if (!existsSync(config.flowPath)) {
    throw new ConfigError(`Flow not found: ${config.flowPath}. Set FLOW_PATH or "graph" in app.config.json.`);
  }
}

/**
 * Load app config, apply env overrides and resolve all paths.
 * Env wins over app.config.json, which wins over the defaults.
 */
export function resolveAppConfig(env: NodeJS.ProcessEnv = process.env): ResolvedAppConfig {
  const config: AppConfig = loadAppConfig(env) ?? {};
  const envParsed = EnvSchema.safeParse(env);
  if (!envParsed.success) {
    const issues = envParsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new ConfigError(`Environment is invalid: ${issues[0]}`, issues);
  }
  const overrides = envParsed.data;

  let flowPath: string;
  if (overrides.FLOW_PATH) {
    flowPath = fromRoot(overrides.FLOW_PATH);
  } else if (config.graph) {
    flowPath = fromRoot(config.graph);
  } else {
    flowPath = getFlowPath(config.flowId ?? DEFAULT_FLOW_ID);
  }

  const resolved: ResolvedAppConfig = {
    flowPath,
    port: overrides.PORT ?? config.port ?? 3000,
    sessionStore: overrides.SESSION_STORE ?? config.sessionStore ?? "memory",
    sessionDir: fromRoot(overrides.SESSION_DIR ?? config.sessionDir ?? ".sessions"),
    sessionTable: config.sessionTable ?? "workflow_sessions",
    capabilityTimeoutMs: overrides.CAPABILITY_TIMEOUT_MS ?? config.capabilityTimeoutMs ?? 10_000,
    storeTimeoutMs: overrides.STORE_TIMEOUT_MS ?? config.storeTimeoutMs ?? 5_000,
    storeRetries: overrides.STORE_RETRIES ?? config.storeRetries ?? 3,
  };

  validateAppConfig(resolved);
  return resolved;
}
