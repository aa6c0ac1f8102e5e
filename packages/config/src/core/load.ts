import type * as core from "zod/v4/core"
import * as z from "zod/mini"
import { EnvSource } from "../adapters/env/env-source"
import type { IConfig } from "../ports/config"
import type { ConfigSource } from "../ports/source"
import { Config } from "./config"
import { ConfigValidationError } from "./config-error"

export type LoadConfigOptions<T extends Record<string, unknown>> = {
  schema: core.$ZodType<T>
  /** Applied in order, later sources override earlier ones. Default: `[new EnvSource()]` */
  sources?: ConfigSource[]
}

export async function loadConfig<T extends Record<string, unknown>>({
  schema,
  sources,
}: LoadConfigOptions<T>): Promise<IConfig<T>> {
  const merged: Record<string, unknown> = {}
  const provenance: Record<string, string> = {}
  const resolvedSources = sources ?? [new EnvSource()]

  for (const source of resolvedSources) {
    const values = await source.load()

    for (const [key, value] of Object.entries(values)) {
      if (value === undefined) continue

      merged[key] = value
      provenance[key] = source.name
    }
  }

  const result = z.safeParse(schema, merged)

  if (!result.success) {
    throw new ConfigValidationError(
      z.prettifyError(result.error),
      resolvedSources.map((s) => s.name),
    )
  }

  return new Config<T>(result.data, provenance, new Set(Object.keys(merged)))
}
