#!/usr/bin/env node
// =============================================================================
// Program.ts — Main Entry Point
// =============================================================================
//
// The edge of the world: wire the Layers together and run the shell.
//
//   NodeFileSystem ─▶ JsonFileContactStore ─▶ ContactBookFromStore (loads once)
//   stdin/stdout   ─▶ TerminalUserInterface (scoped: the readline interface
//                     closes when the program ends)
//
// runShell saves the book through the same ContactStore on the way out, also
// when runMain interrupts it on SIGINT.
//
import { NodeFileSystem, NodeRuntime } from "@effect/platform-node"
import { Effect, Layer, Logger } from "effect"
import { runShell } from "./cli/Shell.js"
import { AppConfig } from "./Config.js"
import { ContactBookFromStore } from "./ContactBook.js"
import { JsonFileContactStoreLive } from "./infrastructure/JsonFileContactStore.js"
import { TerminalUserInterface } from "./infrastructure/TerminalUserInterface.js"

// =============================================================================
// Layer Composition
// =============================================================================

const StoreLive = JsonFileContactStoreLive.pipe(
  Layer.provide(NodeFileSystem.layer)
)

// ContactBook is built from the store; provideMerge keeps the store visible
// to runShell for the final save
const BookLive = ContactBookFromStore.pipe(
  Layer.provideMerge(StoreLive)
)

const MainLive = Layer.merge(BookLive, TerminalUserInterface)

// =============================================================================
// Launch
// =============================================================================

const program = Effect.gen(function* () {
  const config = yield* AppConfig
  yield* runShell.pipe(
    Effect.provide(MainLive),
    Logger.withMinimumLogLevel(config.logLevel)
  )
})

NodeRuntime.runMain(program)
