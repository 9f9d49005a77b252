import React from "react"
import { Command, Options } from "@effect/cli"
import { Effect, Option } from "effect"
import { render } from "ink"
import { writeLastDirectory } from "../cache/lastDirectory.js"
import { AppConfigTag, type AppConfig } from "../config/appConfig.js"
import { BrowserSession, type SessionEffect } from "../session/browserSession.js"
import { BrowserApp } from "../ui/components/BrowserApp.js"
import { launchEditor, openPath } from "../util/launcher.js"
import { debugLog } from "../utils/debug.js"

const dirOption = Options.text("dir").pipe(Options.optional)
const panesOption = Options.integer("panes").pipe(Options.optional)
const noPersistOption = Options.boolean("no-persist")

const describeError = (error: unknown): string => (error instanceof Error ? error.message : String(error))

export const performEffect = async (session: BrowserSession, config: AppConfig, effect: SessionEffect): Promise<void> => {
  if (effect.type === "edit") {
    if (!config.editor) {
      session.notify("No editor configured")
      return
    }
    try {
      const result = await launchEditor(config.editor, effect.path)
      if (result.code !== 0 && result.code !== null) {
        session.notify(`${config.editor} exited with code ${result.code}`)
      }
    } catch (error) {
      debugLog({ editorError: describeError(error), editor: config.editor })
      session.notify(`Failed to launch ${config.editor}: ${describeError(error)}`)
    }
    return
  }
  if (effect.type === "open") {
    try {
      await openPath(config.opener, effect.path)
    } catch (error) {
      debugLog({ openerError: describeError(error), opener: config.opener })
      session.notify(`Failed to open ${effect.path}: ${describeError(error)}`)
    }
  }
}

/**
 * Mounts the browser until it asks for something outside the terminal UI
 * (an editor, the open handler), performs it with Ink unmounted, then re-mounts
 * over the same session. Returns once the user quits.
 */
export const runBrowser = async (session: BrowserSession, config: AppConfig): Promise<void> => {
  for (;;) {
    const outcome: { effect: SessionEffect } = { effect: { type: "quit" } }
    const instance = render(
      <BrowserApp
        session={session}
        onExit={(effect) => {
          outcome.effect = effect
        }}
      />,
      { exitOnCtrlC: false },
    )
    await instance.waitUntilExit()
    if (outcome.effect.type === "quit" || outcome.effect.type === "none") {
      return
    }
    await performEffect(session, config, outcome.effect)
  }
}

export const browseCommand = Command.make(
  "browse",
  { dir: dirOption, panes: panesOption, noPersist: noPersistOption },
  ({ dir, panes, noPersist }) =>
    Effect.gen(function* () {
      const config = yield* AppConfigTag
      const start = Option.getOrElse(dir, () => process.cwd())
      const count = Option.getOrElse(panes, () => config.paneCount)
      const session = yield* Effect.try({
        try: () => BrowserSession.open(start, { count }),
        catch: (error) => error,
      })
      yield* Effect.tryPromise(() => runBrowser(session, config))
      if (!noPersist) {
        yield* Effect.tryPromise(() => writeLastDirectory(session.panes.activeDirectory(), config.lastDirFile))
      }
    }),
)
