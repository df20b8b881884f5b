// =============================================================================
// AppConfig — environment configuration
// =============================================================================
//
//   CONTACTS_FILE  where the JSON store lives       (default: contacts.json)
//   LOG_LEVEL      minimum Effect log level          (default: Warning)
//
// Read through Effect's Config, so tests swap values with
// `Effect.withConfigProvider(ConfigProvider.fromMap(...))`.
//
import { Config, LogLevel } from "effect"

export const DEFAULT_CONTACTS_FILE = "contacts.json"

export const AppConfig = Config.all({
  contactsFile: Config.string("CONTACTS_FILE").pipe(
    Config.withDefault(DEFAULT_CONTACTS_FILE)
  ),
  logLevel: Config.logLevel("LOG_LEVEL").pipe(
    Config.withDefault(LogLevel.Warning)
  )
})

export type AppConfig = Config.Config.Success<typeof AppConfig>
