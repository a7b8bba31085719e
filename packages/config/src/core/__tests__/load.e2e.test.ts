import fs from "node:fs/promises"
import os from "node:os"
import path from "node:path"
import { z } from "zod"
import { DotenvSource } from "../../adapters/dotenv/dotenv-source"
import { EnvSource } from "../../adapters/env/env-source"
import { ObjectSource } from "../../adapters/object/object-source"
import { ConfigError } from "../config-error"
import { loadConfig } from "../load"

const schema = z.object({
  RANDOM_ORG_API_KEY: z.string().min(1),
  RANDOM_ORG_TIMEOUT_MS: z.coerce.number().default(10_000),
  LOG_PRETTY: z.stringbool().default(false),
})

describe("loadConfig e2e", () => {
  let cwd: string

  beforeEach(async () => {
    cwd = await fs.mkdtemp(path.join(os.tmpdir(), "config-e2e-"))
  })

  afterEach(async () => {
    await fs.rm(cwd, { recursive: true })
  })

  it("coerces values and applies defaults", async () => {
    const config = await loadConfig({
      schema,
      sources: [
        new EnvSource({
          env: { RANDOM_ORG_API_KEY: "test-secret", RANDOM_ORG_TIMEOUT_MS: "2500" },
        }),
      ],
    })

    expect(config.value).toEqual({
      RANDOM_ORG_API_KEY: "test-secret",
      RANDOM_ORG_TIMEOUT_MS: 2500,
      LOG_PRETTY: false,
    })
    expect(config.explain("LOG_PRETTY")).toBe("default")
  })

  it("later sources override earlier ones: dotenv < env < object", async () => {
    await fs.writeFile(
      path.join(cwd, ".env"),
      "RANDOM_ORG_API_KEY=from-dotenv\nRANDOM_ORG_TIMEOUT_MS=1000\nLOG_PRETTY=true",
    )

    const config = await loadConfig({
      schema,
      sources: [
        new DotenvSource({ file: ".env", required: true, cwd }),
        new EnvSource({ env: { RANDOM_ORG_API_KEY: "from-env", RANDOM_ORG_TIMEOUT_MS: "2000" } }),
        new ObjectSource({ RANDOM_ORG_TIMEOUT_MS: 3000 }),
      ],
    })

    expect(config.get("RANDOM_ORG_API_KEY")).toBe("from-env")
    expect(config.get("RANDOM_ORG_TIMEOUT_MS")).toBe(3000)
    expect(config.get("LOG_PRETTY")).toBe(true)
    expect(config.explain("RANDOM_ORG_API_KEY")).toBe("env")
    expect(config.explain("RANDOM_ORG_TIMEOUT_MS")).toBe("object:overrides")
    expect(config.explain("LOG_PRETTY")).toBe("dotenv:.env")
  })

  it("skips undefined values and missing optional files", async () => {
    const config = await loadConfig({
      schema,
      sources: [
        new DotenvSource({ file: ".env.missing", required: false, cwd }),
        new EnvSource({ env: { RANDOM_ORG_API_KEY: "test-secret" } }),
        new EnvSource({ env: { RANDOM_ORG_API_KEY: undefined } }),
      ],
    })

    expect(config.get("RANDOM_ORG_API_KEY")).toBe("test-secret")
  })

  it("reports keys outside the schema", async () => {
    const config = await loadConfig({
      schema,
      sources: [new EnvSource({ env: { RANDOM_ORG_API_KEY: "k", HOME: "/root" } })],
    })

    expect(config.extras()).toEqual(["HOME"])
  })

  it("throws ConfigError listing the failing keys", async () => {
    const load = loadConfig({
      schema,
      sources: [new EnvSource({ env: { RANDOM_ORG_TIMEOUT_MS: "soon" } })],
    })

    await expect(load).rejects.toBeInstanceOf(ConfigError)
    await expect(load).rejects.toMatchObject({
      code: "invalid_config",
      context: {
        issues: expect.arrayContaining([
          expect.objectContaining({ path: "RANDOM_ORG_API_KEY" }),
          expect.objectContaining({ path: "RANDOM_ORG_TIMEOUT_MS" }),
        ]),
      },
    })
  })
})
