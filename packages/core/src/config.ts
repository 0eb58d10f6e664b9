import { isLogLevel, type LogLevel } from "./logger.js"

export interface SurrogateConfig {
  readonly devMode: boolean
  readonly logLevel: LogLevel
}

export type SurrogateEnv = Readonly<Record<string, string | undefined>>

const DEFAULT_LOG_LEVEL: LogLevel = "warnings"

export const SurrogateConfig = {
  /**
   * Explicit overrides win, then the environment:
   *   SURROGATE_DEV=1|true     debug logging
   *   SURROGATE_LOG_LEVEL      silent | errors | warnings | info | debug
   */
  build(overrides: Partial<SurrogateConfig> = {}, env: SurrogateEnv = process.env): SurrogateConfig {
    const devMode = overrides.devMode
      ?? (env.SURROGATE_DEV === "1" || env.SURROGATE_DEV === "true")

    const envLevel = env.SURROGATE_LOG_LEVEL
    const logLevel = overrides.logLevel
      ?? (isLogLevel(envLevel) ? envLevel : devMode ? "debug" : DEFAULT_LOG_LEVEL)

    return { devMode, logLevel }
  },
}
