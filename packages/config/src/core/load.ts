import * as z from "zod/v4/core"
import { EnvSource } from "../adapters/env/env-source"
import type { IConfig } from "../ports/config"
import type { ConfigSource } from "../ports/source"
import { applyAliases, type ConfigAliases } from "./aliases"
import { Config } from "./config"
import { ConfigError } from "./config-error"

export type LoadConfigOptions<S extends z.$ZodType> = {
  schema: S

  /** @default [new EnvSource()] */
  sources?: ConfigSource[]

  aliases?: ConfigAliases
}

export async function loadConfig<S extends z.$ZodType>({
  schema,
  sources,
  aliases = {},
}: LoadConfigOptions<S>): Promise<IConfig<z.output<S>>> {
  const merged: Record<string, string> = {}
  const provenance: Record<string, string> = {}

  for (const source of sources ?? [new EnvSource()]) {
    const values = await source.load()

    for (const [key, value] of Object.entries(values)) {
      if (value === undefined) continue

      merged[key] = value
      provenance[key] = source.name
    }
  }

  const supplied = new Set(Object.keys(merged))

  applyAliases(merged, provenance, aliases)

  const result = z.safeParse(schema, merged)

  if (!result.success) {
    const issues = result.error.issues.map((issue) => ({
      path: issue.path.map(String).join("."),
      message: issue.message,
    }))

    throw ConfigError.invalid(z.prettifyError(result.error), issues)
  }

  const parsed: unknown = result.data
  const schemaKeys = new Set(
    typeof parsed === "object" && parsed !== null ? Object.keys(parsed) : [],
  )

  const finalProvenance: Record<string, string> = {}
  for (const key of schemaKeys) {
    finalProvenance[key] = provenance[key] ?? "default"
  }

  return new Config(result.data, finalProvenance, {
    schema: schemaKeys,
    supplied,
    aliases: new Set(Object.values(aliases).flat()),
  })
}
