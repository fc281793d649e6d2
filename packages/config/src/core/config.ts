import type { IConfig } from "../ports/config"

export type ConfigKeys = {
  /** Keys the schema produced. */
  schema: ReadonlySet<string>
  /** Keys any source supplied. */
  supplied: ReadonlySet<string>
  /** Alias keys that were declared, whether or not they were read. */
  aliases: ReadonlySet<string>
}

export class Config<T> implements IConfig<T> {
  constructor(
    private readonly data: T,
    private readonly provenance: Readonly<Record<string, string>>,
    private readonly keys: ConfigKeys,
  ) {
    Object.freeze(this.data)
  }

  get value(): T {
    return this.data
  }

  explain<K extends keyof T & string>(key: K): string {
    return this.provenance[key] ?? "default"
  }

  sourcesUsed(): string[] {
    const names = Object.values(this.provenance)
      .filter((name) => name !== "default")
      .map((name) => name.replace(/ \(.*\)$/, ""))

    return [...new Set(names)]
  }

  unknownKeys(): string[] {
    return [...this.keys.supplied].filter(
      (key) => !this.keys.schema.has(key) && !this.keys.aliases.has(key),
    )
  }
}
