import { readFileSync, existsSync } from "node:fs";
import path from "node:path";
import * as z from "zod";

export const AppConfigSchema = z.object({
  flowPath: z.string().min(1).optional(),
  port: z.number().int().min(0).max(65535).optional(),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;

export interface ResolvedAppConfig {
  configPath: string | null;
  flowPath: string;
  port: number;
}

const PROJECT_ROOT = path.resolve(__dirname, "../..");
const DEFAULT_PORT = 3000;

export function getDefaultFlowPath(): string {
  return path.join(PROJECT_ROOT, "graphs", "email-assistant.flow.yaml");
}

function resolveFromRoot(target: string): string {
  return path.isAbsolute(target) ? target : path.resolve(PROJECT_ROOT, target);
}

/**
 * Resolve the path to app.config.json.
 * Priority: APP_CONFIG_PATH env > <project root>/app.config.json
 */
export function getAppConfigPath(): string {
  const explicitPath = process.env.APP_CONFIG_PATH;
  return explicitPath ? resolveFromRoot(explicitPath) : path.join(PROJECT_ROOT, "app.config.json");
}

/**
 * Load and validate app.config.json.
 * Returns null if the file does not exist.
 */
export function loadAppConfig(): AppConfig | null {
  const configPath = getAppConfigPath();
  if (!existsSync(configPath)) {
    return null;
  }
  const raw: unknown = JSON.parse(readFileSync(configPath, "utf-8"));
  const result = AppConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new Error(`Invalid app config at ${configPath}: ${result.error.issues.map((i) => i.message).join("; ")}`);
  }
  return result.data;
}

function parsePort(raw: string | undefined): number | null {
  if (!raw) return null;
  const port = Number(raw);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new Error(`Invalid PORT "${raw}". Expected an integer between 0 and 65535.`);
  }
  return port;
}

/**
 * Validate that the flow file exists.
 * Throws with clear error message if validation fails.
 */
export function validateAppConfig(config: ResolvedAppConfig): void {
  if (!existsSync(config.flowPath)) {
    throw new Error(`Flow not found: ${config.flowPath}. Set FLOW_PATH or "flowPath" in app.config.json.`);
  }
}

/**
 * Load app config and resolve everything the server needs at startup.
 * Flow: FLOW_PATH env > app.config.json > graphs/email-assistant.flow.yaml
 * Port: PORT env > app.config.json > 3000
 */
export function resolveAppConfig(): ResolvedAppConfig {
  const config = loadAppConfig();
  const flowSource = process.env.FLOW_PATH || config?.flowPath;

  const resolved: ResolvedAppConfig = {
    configPath: config ? getAppConfigPath() : null,
    flowPath: flowSource ? resolveFromRoot(flowSource) : getDefaultFlowPath(),
    port: parsePort(process.env.PORT) ?? config?.port ?? DEFAULT_PORT,
  };

  validateAppConfig(resolved);
  return resolved;
}
