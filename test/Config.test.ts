import { describe, expect, it } from "@effect/vitest"
import { ConfigError, ConfigProvider, Effect, LogLevel } from "effect"
import { AppConfig, DEFAULT_CONTACTS_FILE } from "../src/Config.js"

const withEnv = (entries: ReadonlyArray<readonly [string, string]>) =>
  Effect.withConfigProvider(ConfigProvider.fromMap(new Map(entries)))

describe("AppConfig", () => {
  it.effect("falls back to defaults", () =>
    Effect.gen(function* () {
      const config = yield* AppConfig.pipe(withEnv([]))

      expect(config.contactsFile).toBe(DEFAULT_CONTACTS_FILE)
      expect(config.logLevel).toBe(LogLevel.Warning)
    })
  )

  it.effect("reads CONTACTS_FILE", () =>
    Effect.gen(function* () {
      const config = yield* AppConfig.pipe(withEnv([["CONTACTS_FILE", "/tmp/book.json"]]))

      expect(config.contactsFile).toBe("/tmp/book.json")
    })
  )

  it.effect("reads LOG_LEVEL", () =>
    Effect.gen(function* () {
      const config = yield* AppConfig.pipe(withEnv([["LOG_LEVEL", "DEBUG"]]))

      expect(config.logLevel).toBe(LogLevel.Debug)
      expect(config.contactsFile).toBe(DEFAULT_CONTACTS_FILE)
    })
  )

  it.effect("an unknown LOG_LEVEL → ConfigError", () =>
    Effect.gen(function* () {
      const error = yield* Effect.flip(AppConfig.pipe(withEnv([["LOG_LEVEL", "loudest"]])))

      expect(ConfigError.isConfigError(error)).toBe(true)
    })
  )
})
