import { type ConfigSource, DotenvSource, EnvSource, loadConfig } from "@pricecache/config"

import { type AppConfig, type EnvConfig, envSchema } from "./schema"

export function mapEnvToConfig(env: EnvConfig): AppConfig {
  return {
    app: {
      env: env.APP_ENV,
    },
    logging: {
      level: env.LOG_LEVEL,
      prettify: env.LOG_PRETTY,
      serviceName: env.SERVICE_NAME,
    },
    priceCache: {
      maxAgeMs: env.PRICE_CACHE_MAX_AGE_MS,
      lookupTimeoutMs: env.PRICE_CACHE_LOOKUP_TIMEOUT_MS,
      singleFlight: env.PRICE_CACHE_SINGLE_FLIGHT,
      resultOrder: env.PRICE_CACHE_RESULT_ORDER,
    },
    quotes: {
      latencyMs: env.QUOTE_SERVICE_LATENCY_MS,
    },
  }
}

/**
 * Load configuration from `.env.<NODE_ENV>` (optional) overlaid with `env`.
 */
export async function loadAppConfig(
  env: NodeJS.ProcessEnv,
  cwd: string = process.cwd(),
): Promise<AppConfig> {
  const sources: ConfigSource[] = [
    new DotenvSource({ file: `.env.${env.NODE_ENV ?? "development"}`, required: false, cwd }),
    new EnvSource({ env }),
  ]

  const result = await loadConfig({ schema: envSchema, sources })

  return mapEnvToConfig(result.value)
}
