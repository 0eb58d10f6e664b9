import { describe, test, expect } from "vitest"
import { SurrogateConfig } from "../config.js"

describe("SurrogateConfig.build", () => {
  test("defaults to warnings outside dev mode", () => {
    expect(SurrogateConfig.build({}, {})).toEqual({ devMode: false, logLevel: "warnings" })
  })

  test("SURROGATE_DEV selects debug logging", () => {
    expect(SurrogateConfig.build({}, { SURROGATE_DEV: "1" })).toEqual({ devMode: true, logLevel: "debug" })
    expect(SurrogateConfig.build({}, { SURROGATE_DEV: "true" }).devMode).toBe(true)
    expect(SurrogateConfig.build({}, { SURROGATE_DEV: "yes" }).devMode).toBe(false)
  })

  test("SURROGATE_LOG_LEVEL wins over dev mode", () => {
    const config = SurrogateConfig.build({}, { SURROGATE_DEV: "1", SURROGATE_LOG_LEVEL: "info" })
    expect(config.logLevel).toBe("info")
  })

  test("invalid SURROGATE_LOG_LEVEL falls back", () => {
    expect(SurrogateConfig.build({}, { SURROGATE_LOG_LEVEL: "loud" }).logLevel).toBe("warnings")
  })

  test("overrides win over the environment", () => {
    const config = SurrogateConfig.build(
      { logLevel: "silent", devMode: false },
      { SURROGATE_DEV: "1", SURROGATE_LOG_LEVEL: "debug" },
    )
    expect(config).toEqual({ devMode: false, logLevel: "silent" })
  })
})
