/**
 * Canonical key → legacy keys, most preferred first.
 */
export type ConfigAliases = Readonly<Record<string, readonly string[]>>

/**
 * Fills each canonical key that is still unset from the first alias holding a
 * non-empty value. Mutates `merged` and `provenance`.
 */
export function applyAliases(
  merged: Record<string, string>,
  provenance: Record<string, string>,
  aliases: ConfigAliases,
): void {
  for (const [canonical, legacy] of Object.entries(aliases)) {
    if (isSet(merged[canonical])) continue

    for (const alias of legacy) {
      const value = merged[alias]
      if (!isSet(value)) continue

      merged[canonical] = value
      provenance[canonical] = `${provenance[alias] ?? "unknown"} (${alias})`
      break
    }
  }
}

function isSet(value: string | undefined): value is string {
  return value !== undefined && value !== ""
}
