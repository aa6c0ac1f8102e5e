import type { ResultOrder } from "@pricecache/cache"
import type { Milliseconds } from "@pricecache/clock"
import { type LogLevelName, logLevelNames } from "@pricecache/logger"
import { z } from "zod/mini"

export const resultOrders = ["completion", "request"] as const satisfies readonly ResultOrder[]

const nonNegativeMs = () => z.coerce.number().check(z.minimum(0))
const positiveMs = () => z.coerce.number().check(z.positive())

export const envSchema = z.object({
  APP_ENV: z._default(z.string(), "development"),
  SERVICE_NAME: z._default(z.string(), "price-quotes"),

  LOG_LEVEL: z._default(z.enum(logLevelNames), "info"),
  LOG_PRETTY: z._default(z.stringbool(), false),

  PRICE_CACHE_MAX_AGE_MS: z._default(nonNegativeMs(), 60_000),
  PRICE_CACHE_LOOKUP_TIMEOUT_MS: z._default(positiveMs(), 2_000),
  PRICE_CACHE_SINGLE_FLIGHT: z._default(z.stringbool(), false),
  PRICE_CACHE_RESULT_ORDER: z._default(z.enum(resultOrders), "completion"),

  QUOTE_SERVICE_LATENCY_MS: z._default(nonNegativeMs(), 250),
})

export type EnvConfig = z.infer<typeof envSchema>

export type AppConfig = {
  app: {
    env: string
  }

  logging: {
    level: LogLevelName
    prettify: boolean
    serviceName: string
  }

  priceCache: {
    maxAgeMs: Milliseconds
    lookupTimeoutMs: Milliseconds
    singleFlight: boolean
    resultOrder: ResultOrder
  }

  quotes: {
    latencyMs: Milliseconds
  }
}
