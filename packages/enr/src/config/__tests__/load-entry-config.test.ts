import { ConfigValidationError } from "@enrkit/config"
import { PinoLogger } from "@enrkit/logger"
import { Writable } from "node:stream"
import { loadEntryConfig, mapEnvToConfig } from "../load-entry-config"

function makeLineDestination() {
  const lines: Record<string, unknown>[] = []

  const destination = new Writable({
    write(chunk, _encoding, callback) {
      const line = chunk.toString("utf8").trim()
      if (line) lines.push(JSON.parse(line))
      callback()
    },
  })

  return { lines, destination }
}

describe("loadEntryConfig", () => {
  it("falls back to defaults", async () => {
    await expect(loadEntryConfig({ env: {} })).resolves.toEqual({
      maxSize: 300,
      logging: { level: "info", prettify: false, serviceName: "enr" },
    })
  })

  it("reads and coerces environment variables", async () => {
    const config = await loadEntryConfig({
      env: {
        ENR_MAX_SIZE: "512",
        LOG_LEVEL: "debug",
        LOG_PRETTY: "true",
        SERVICE_NAME: "node-a",
      },
    })

    expect(config).toEqual({
      maxSize: 512,
      logging: { level: "debug", prettify: true, serviceName: "node-a" },
    })
  })

  it("applies overrides on top of the environment", async () => {
    const config = await loadEntryConfig({
      env: { ENR_MAX_SIZE: "512" },
      overrides: { ENR_MAX_SIZE: 1024 },
    })

    expect(config.maxSize).toBe(1024)
  })

  it.each([
    ["a non-positive size", { ENR_MAX_SIZE: "0" }],
    ["a fractional size", { ENR_MAX_SIZE: "300.5" }],
    ["a non-numeric size", { ENR_MAX_SIZE: "big" }],
    ["an unknown log level", { LOG_LEVEL: "loud" }],
    ["a non-boolean pretty flag", { LOG_PRETTY: "maybe" }],
  ])("rejects %s", async (_, env) => {
    await expect(loadEntryConfig({ env })).rejects.toBeInstanceOf(ConfigValidationError)
  })

  describe("logging", () => {
    async function load(env: Record<string, string>, overrides: Record<string, unknown> = {}) {
      const { lines, destination } = makeLineDestination()
      const logger = new PinoLogger({ destination }, { level: "debug" }, { service: "enr" })

      await loadEntryConfig({ env, overrides, logger })
      return lines
    }

    it("logs the source of every setting", async () => {
      const lines = await load({ ENR_MAX_SIZE: "512" }, { LOG_LEVEL: "warn" })

      const sources = lines
        .filter((l) => l.msg === "config value")
        .map((l) => [l.key, l.source])

      expect(sources).toEqual([
        ["SERVICE_NAME", "default"],
        ["ENR_MAX_SIZE", "env"],
        ["LOG_LEVEL", "object:overrides"],
        ["LOG_PRETTY", "default"],
      ])
      expect(lines[0]).toMatchObject({ level: 20, module: "config", service: "enr" })
    })

    it("warns about misspelled settings and ignores the rest of the environment", async () => {
      const lines = await load({ ENR_MAX_SZE: "512", LOG_LEVLE: "debug", HOME: "/root" })

      const warnings = lines.filter((l) => l.level === 40)

      expect(warnings).toEqual([
        expect.objectContaining({ msg: "unknown config key", key: "ENR_MAX_SZE" }),
        expect.objectContaining({ msg: "unknown config key", key: "LOG_LEVLE" }),
      ])
    })

    it("stays quiet about unknown keys when every setting is known", async () => {
      const lines = await load({ ENR_MAX_SIZE: "512", PATH: "/usr/bin" })

      expect(lines.filter((l) => l.level === 40)).toEqual([])
    })
  })
})

describe("mapEnvToConfig", () => {
  it("groups logging settings", () => {
    expect(
      mapEnvToConfig({
        SERVICE_NAME: "svc",
        ENR_MAX_SIZE: 64,
        LOG_LEVEL: "warn",
        LOG_PRETTY: false,
      }),
    ).toEqual({ maxSize: 64, logging: { level: "warn", prettify: false, serviceName: "svc" } })
  })
})
