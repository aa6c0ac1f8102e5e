import type { PriceService } from "@pricecache/cache"

import { type AppConfig, loadAppConfig } from "./config"
import { type CoreServices, createCoreServices } from "./services/core"
import { createQuoteServices, type QuoteServices } from "./services/quotes"

export type AppContextOptions = {
  env?: NodeJS.ProcessEnv

  /** Directory the optional `.env.<NODE_ENV>` file is read from. */
  cwd?: string

  coreOverrides?: Partial<CoreServices>

  /** Replaces the simulated upstream. */
  quoteService?: PriceService
}

export type AppContext = {
  config: AppConfig
  services: {
    core: CoreServices
    quotes: QuoteServices
  }
}

export async function createAppContext(
  options: AppContextOptions = {},
): Promise<AppContext> {
  const config = await loadAppConfig(options.env ?? process.env, options.cwd)

  const core = { ...createCoreServices(config), ...options.coreOverrides }
  const quotes = createQuoteServices(config, core, options.quoteService)

  return { config, services: { core, quotes } }
}
