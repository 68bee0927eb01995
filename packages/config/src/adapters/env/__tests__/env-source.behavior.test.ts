import { EnvSource } from "../env-source"

describe("EnvSource", () => {
  it("is named after its prefix", () => {
    expect(new EnvSource({ env: {} }).name).toBe("env")
    expect(new EnvSource({ prefix: "NODE_", env: {} }).name).toBe("env:NODE_")
  })

  it("returns a copy of the whole environment without a prefix", async () => {
    const env = { ENR_MAX_SIZE: "300", HOME: "/home/test" }
    const values = await new EnvSource({ env }).load()

    expect(values).toEqual(env)
    expect(values).not.toBe(env)
  })

  it("keeps prefixed keys and strips the prefix", async () => {
    const source = new EnvSource({
      prefix: "NODE_",
      env: { NODE_ENR_MAX_SIZE: "200", OTHER: "x" },
    })

    expect(await source.load()).toEqual({ ENR_MAX_SIZE: "200" })
  })

  it("treats blank values as unset and trims the rest", async () => {
    const source = new EnvSource({
      env: { ENR_MAX_SIZE: "", LOG_LEVEL: "  ", SERVICE_NAME: " node-a ", UNSET: undefined },
    })

    expect(await source.load()).toEqual({ SERVICE_NAME: "node-a" })
  })

  it("defaults to process.env", async () => {
    vi.stubEnv("ENR_TEST_MARKER", "present")

    const values = await new EnvSource().load()

    expect(values.ENR_TEST_MARKER).toBe("present")
    vi.unstubAllEnvs()
  })
})
