import React from "react"
import { useApp, useInput, useStdout } from "ink"
import type { BrowserSession, SessionEffect } from "../../session/browserSession.js"
import { BrowserView } from "./BrowserView.js"

export const DEFAULT_TERMINAL_ROWS = 24

interface BrowserAppProps {
  readonly session: BrowserSession
  readonly onExit: (effect: SessionEffect) => void
}

export const BrowserApp = ({ session, onExit }: BrowserAppProps) => {
  const { exit } = useApp()
  const { stdout } = useStdout()
  const [, setRevision] = React.useState(0)

  React.useEffect(() => {
    const applySize = () => {
      session.resize(stdout.rows ?? DEFAULT_TERMINAL_ROWS)
      setRevision((value) => value + 1)
    }
    applySize()
    stdout.on("resize", applySize)
    return () => {
      stdout.off("resize", applySize)
    }
  }, [session, stdout])

  useInput((input, key) => {
    const effect = session.handleKey(input, key)
    if (effect.type !== "none") {
      onExit(effect)
      exit()
      return
    }
    setRevision((value) => value + 1)
  })

  const pane = session.activePane()
  return (
    <BrowserView
      paneCount={session.panes.count}
      activeIndex={session.panes.activeIndex}
      directory={pane.currentDir}
      rows={pane.listing()}
      mode={session.mode}
      status={session.status}
    />
  )
}
