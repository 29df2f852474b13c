/**
 * Configuration management for kubemend
 */

import { z } from 'zod';
import { config as dotenvConfig } from 'dotenv';
import { resolve, dirname } from 'path';
import { fileURLToPath } from 'url';

// Load environment variables - the API may be started from apps/api or from the repo root
const __dirname = dirname(fileURLToPath(import.meta.url));
const monorepoRoot = resolve(__dirname, '../../../../');

const envPaths = [
  resolve(process.cwd(), '.env'),
  resolve(process.cwd(), '../../.env'),
  resolve(monorepoRoot, '.env'),
];

for (const envPath of envPaths) {
  if (!process.env.API_TOKEN) {
    dotenvConfig({ path: envPath });
  }
}

// z.coerce.boolean() turns the string 'false' into true, so flags are parsed explicitly
const envBoolean = (defaultValue: boolean) =>
  z
    .enum(['true', 'false', '1', '0'])
    .optional()
    .transform((val) => (val === undefined ? defaultValue : val === 'true' || val === '1'));

const commaList = z
  .string()
  .default('')
  .transform((val) =>
    val
      .split(',')
      .map((item) => item.trim())
      .filter(Boolean)
  );

// Configuration schema
const configSchema = z.object({
  // Application
  nodeEnv: z.enum(['development', 'production', 'test']).default('development'),
  logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('info'),

  // Server
  server: z.object({
    port: z.coerce.number().int().positive().default(8000),
    host: z.string().default('0.0.0.0'),
    corsOrigin: z.string().default('*'),
  }),

  // Shared secret presented by alerting callers as a bearer token
  auth: z.object({
    apiToken: z.string().min(1, 'API_TOKEN is required'),
  }),

  // Kubernetes
  kubernetes: z.object({
    kubeconfig: z.string().optional(),
    context: z.string().optional(),
    defaultNamespace: z.string().default('default'),
    /** Empty list means every namespace is accepted */
    allowedNamespaces: commaList,
    requestTimeoutMs: z.coerce.number().int().positive().default(10000),
    dryRun: envBoolean(false),
    fieldManager: z.string().default('kubemend'),
  }),

  // Remediation
  remediation: z.object({
    maxAttempts: z.coerce.number().int().min(1).default(3),
    retryDelayMs: z.coerce.number().int().min(0).default(200),
  }),
});

export type Config = z.infer<typeof configSchema>;

// Parse and validate configuration
function loadConfig(): Config {
  const rawConfig = {
    nodeEnv: process.env.NODE_ENV,
    logLevel: process.env.LOG_LEVEL,

    server: {
      port: process.env.PORT,
      host: process.env.HOST,
      corsOrigin: process.env.CORS_ORIGIN,
    },

    auth: {
      apiToken: process.env.API_TOKEN ?? '',
    },

    kubernetes: {
      kubeconfig: process.env.KUBECONFIG,
      context: process.env.K8S_CONTEXT,
      defaultNamespace: process.env.K8S_DEFAULT_NAMESPACE,
      allowedNamespaces: process.env.K8S_ALLOWED_NAMESPACES,
      requestTimeoutMs: process.env.K8S_REQUEST_TIMEOUT_MS,
      dryRun: process.env.K8S_DRY_RUN,
      fieldManager: process.env.K8S_FIELD_MANAGER,
    },

    remediation: {
      maxAttempts: process.env.REMEDIATION_MAX_ATTEMPTS,
      retryDelayMs: process.env.REMEDIATION_RETRY_DELAY_MS,
    },
  };

  return configSchema.parse(rawConfig);
}

// Singleton config instance
let configInstance: Config | null = null;

export function getConfig(): Config {
  if (!configInstance) {
    configInstance = loadConfig();
  }
  return configInstance;
}

// For testing - reset config
export function resetConfig(): void {
  configInstance = null;
}

// Validate config without loading (for startup checks)
export function validateConfig(): { valid: boolean; errors?: string[] } {
  try {
    loadConfig();
    return { valid: true };
  } catch (error) {
    if (error instanceof z.ZodError) {
      return {
        valid: false,
        errors: error.errors.map((e) => `${e.path.join('.')}: ${e.message}`),
      };
    }
    throw error;
  }
}
