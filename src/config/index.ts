/**
 * Runtime configuration, read once from the process environment.
 *
 * HF_API_KEY is the only required value; its absence is fatal before
 * any stage starts.
 */

import { z } from 'zod';
import { CloudProviderSchema, type CloudProvider, type TechStack } from '../contracts/index.js';
import { ConfigurationError } from '../runner/errors.js';
import type { LogLevel } from '../runner/logger.js';

export const DEFAULT_BASE_URL = 'https://router.huggingface.co/v1';
export const DEFAULT_MODEL = 'meta-llama/Llama-3.1-8B-Instruct';
export const DEFAULT_CLOUD_PROVIDER: CloudProvider = 'AWS';

const booleanFlag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform((v) => v === 'true' || v === '1' || v === 'yes');

const EnvSchema = z.object({
  HF_API_KEY: z.string({ required_error: 'HF_API_KEY is not set' }).trim().min(1, 'HF_API_KEY is empty'),
  COSTPLAN_BASE_URL: z.string().url().default(DEFAULT_BASE_URL),
  COSTPLAN_MODEL: z.string().min(1).default(DEFAULT_MODEL),
  COSTPLAN_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),
  COSTPLAN_MAX_ATTEMPTS: z.coerce.number().int().min(1).max(10).default(3),
  COSTPLAN_BACKOFF_MS: z.coerce.number().int().min(0).default(1000),
  COSTPLAN_CLOUD_PROVIDER: CloudProviderSchema.optional(),
  COSTPLAN_ALIGN_BILLING: booleanFlag.default('true'),
  COSTPLAN_LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'fatal']).default('info'),
});

export interface AppConfig {
  apiKey: string;
  baseUrl: string;
  model: string;
  temperature: number;
  timeoutMs: number;
  maxAttempts: number;
  backoffMs: number;
  /** Explicit provider; when absent it is detected from the tech stack. */
  cloudProvider?: CloudProvider;
  alignBillingToBudget: boolean;
  logLevel: LogLevel;
}

/**
 * Validate the environment into an AppConfig.
 * Throws ConfigurationError listing every problem found.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
    throw new ConfigurationError(`Invalid configuration: ${problems.join('; ')}`, { problems });
  }

  const e = parsed.data;
  return {
    apiKey: e.HF_API_KEY,
    baseUrl: e.COSTPLAN_BASE_URL,
    model: e.COSTPLAN_MODEL,
    temperature: 0.1,
    timeoutMs: e.COSTPLAN_TIMEOUT_MS,
    maxAttempts: e.COSTPLAN_MAX_ATTEMPTS,
    backoffMs: e.COSTPLAN_BACKOFF_MS,
    cloudProvider: e.COSTPLAN_CLOUD_PROVIDER,
    alignBillingToBudget: e.COSTPLAN_ALIGN_BILLING,
    logLevel: e.COSTPLAN_LOG_LEVEL,
  };
}

/**
 * Resolve the provider a run targets: explicit setting first, then a
 * mention in the tech stack, then the default.
 */
export function resolveCloudProvider(configured: CloudProvider | undefined, techStack: TechStack): CloudProvider {
  if (configured) return configured;

  const text = Object.values(techStack).join(' ').toLowerCase();
  if (text.includes('azure')) return 'Azure';
  if (text.includes('gcp') || text.includes('google')) return 'GCP';
  if (text.includes('digitalocean') || text.includes('digital ocean')) return 'DigitalOcean';
  if (text.includes('oracle')) return 'Oracle Cloud';
  return DEFAULT_CLOUD_PROVIDER;
}

/** Config fields safe to log. */
export function configSummary(config: AppConfig): Record<string, unknown> {
  return {
    base_url: config.baseUrl,
    model: config.model,
    timeout_ms: config.timeoutMs,
    max_attempts: config.maxAttempts,
    backoff_ms: config.backoffMs,
    cloud_provider: config.cloudProvider ?? 'auto',
    align_billing: config.alignBillingToBudget,
  };
}
