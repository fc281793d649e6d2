import { Config } from "../config"

describe("Config", () => {
  const config = new Config(
    { SERVER_PORT: 8001, STORAGE_ROOT: "/data", LOG_LEVEL: "info" },
    { SERVER_PORT: "env", STORAGE_ROOT: "env (BASE_DIR)", LOG_LEVEL: "default" },
    {
      schema: new Set(["SERVER_PORT", "STORAGE_ROOT", "LOG_LEVEL"]),
      supplied: new Set(["SERVER_PORT", "BASE_DIR", "STALE_KEY"]),
      aliases: new Set(["BASE_DIR"]),
    },
  )

  it("exposes the frozen value", () => {
    expect(config.value.SERVER_PORT).toBe(8001)
    expect(Object.isFrozen(config.value)).toBe(true)
  })

  it("explains provenance", () => {
    expect(config.explain("SERVER_PORT")).toBe("env")
    expect(config.explain("STORAGE_ROOT")).toBe("env (BASE_DIR)")
    expect(config.explain("LOG_LEVEL")).toBe("default")
  })

  it("lists the sources used once each", () => {
    expect(config.sourcesUsed()).toEqual(["env"])
  })

  it("reports supplied keys unknown to schema and aliases", () => {
    expect(config.unknownKeys()).toEqual(["STALE_KEY"])
  })
})
