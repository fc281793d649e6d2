import { EnvSource } from "../env-source"

describe("EnvSource behavior", () => {
  it("reads every key without a prefix", async () => {
    const source = new EnvSource({ env: { A: "1", B: "2" } })

    expect(await source.load()).toEqual({ A: "1", B: "2" })
  })

  it("keeps only prefixed keys and strips the prefix", async () => {
    const source = new EnvSource({
      prefix: "BUCKETFS_",
      env: { BUCKETFS_STORAGE_ROOT: "/data", STORAGE_ROOT: "/ignored" },
    })

    expect(await source.load()).toEqual({ STORAGE_ROOT: "/data" })
  })

  it("defaults to process.env", async () => {
    vi.stubEnv("BUCKETFS_ENV_SOURCE_PROBE", "yes")

    const result = await new EnvSource().load()

    expect(result.BUCKETFS_ENV_SOURCE_PROBE).toBe("yes")
    vi.unstubAllEnvs()
  })
})
