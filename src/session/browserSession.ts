import { homedir } from "node:os"
import path from "node:path"
import { IoError, NotADirectoryError, PaneIndexError } from "../browser/errors.js"
import {
  appendInput,
  cancelCommand,
  commandMode,
  eraseInput,
  normalMode,
  submitCommand,
  type Mode,
} from "../browser/mode.js"
import { PaneSet, type PaneSetOptions } from "../browser/paneSet.js"
import type { PaneState } from "../browser/paneState.js"
import { debugLog } from "../utils/debug.js"
import { parseCommand } from "./commands.js"
import { resolveNormalKey, type KeyPress, type NormalAction } from "./keymap.js"

export type SessionEffect =
  | { readonly type: "none" }
  | { readonly type: "quit" }
  | { readonly type: "edit"; readonly path: string }
  | { readonly type: "open"; readonly path: string }

const NONE: SessionEffect = { type: "none" }

// Header and footer rows, plus the window row past viewportHeight.
export const CHROME_ROWS = 3

export const expandHome = (value: string, home: string = homedir()): string => {
  if (value === "~") return home
  if (value.startsWith("~/")) return path.join(home, value.slice(2))
  return value
}

export class BrowserSession {
  readonly panes: PaneSet
  private modeState: Mode = normalMode()
  private statusLine: string | null = null

  constructor(panes: PaneSet) {
    this.panes = panes
  }

  /** Opens every pane at `dir`; an unreadable start directory throws `IoError`. */
  static open(dir: string, options: PaneSetOptions = {}): BrowserSession {
    return new BrowserSession(PaneSet.open(dir, options))
  }

  get mode(): Mode {
    return this.modeState
  }

  get status(): string | null {
    return this.statusLine
  }

  notify(message: string): void {
    this.statusLine = message
  }

  activePane(): PaneState {
    return this.panes.active()
  }

  resize(terminalRows: number): void {
    this.panes.setViewportHeight(Math.max(0, terminalRows - CHROME_ROWS))
  }

  handleKey(input: string, key: KeyPress): SessionEffect {
    if (this.modeState.kind === "command") {
      return this.handleCommandKey(input, key)
    }
    const action = resolveNormalKey(input, key)
    if (!action) return NONE
    this.statusLine = null
    return this.applyAction(action)
  }

  runCommand(text: string): SessionEffect {
    const command = parseCommand(text)
    debugLog({ command: command.type, text })
    this.statusLine = null
    switch (command.type) {
      case "empty":
        return NONE
      case "cd":
        this.navigate(() => this.activePane().changeDirectory(expandHome(command.path)))
        return NONE
      case "hidden":
        this.navigate(() => this.activePane().toggleHidden())
        return NONE
      case "mark":
        return this.applyAction({ type: "toggle-mark" })
      case "unmark":
        this.activePane().clearMarks()
        return NONE
      case "pane":
        if (command.index == null) {
          this.statusLine = "Usage: pane <n>"
          return NONE
        }
        return this.applyAction({ type: "switch-pane", index: command.index })
      case "edit":
        return this.applyAction({ type: "edit" })
      case "open":
        return this.applyAction({ type: "open" })
      case "quit":
        return { type: "quit" }
      case "unknown":
        this.statusLine = `Unknown command: ${command.name}`
        return NONE
    }
  }

  private handleCommandKey(input: string, key: KeyPress): SessionEffect {
    if (key.escape) {
      this.modeState = cancelCommand(this.modeState)
      return NONE
    }
    if (key.return) {
      const { mode, command } = submitCommand(this.modeState)
      this.modeState = mode
      return command == null ? NONE : this.runCommand(command)
    }
    if (key.backspace || key.delete) {
      this.modeState = eraseInput(this.modeState)
      return NONE
    }
    if (key.ctrl || key.meta || key.tab || key.upArrow || key.downArrow || key.leftArrow || key.rightArrow) {
      return NONE
    }
    if (input.length > 0) {
      this.modeState = appendInput(this.modeState, input)
    }
    return NONE
  }

  private applyAction(action: NormalAction): SessionEffect {
    const pane = this.activePane()
    switch (action.type) {
      case "quit":
        return { type: "quit" }
      case "cursor-up":
        pane.cursorUp(action.amount)
        return NONE
      case "cursor-down":
        pane.cursorDown(action.amount)
        return NONE
      case "leave":
        this.navigate(() => pane.leaveToParent())
        return NONE
      case "enter":
        this.navigate(() => pane.enterTarget())
        return NONE
      case "toggle-hidden":
        this.navigate(() => pane.toggleHidden())
        return NONE
      case "toggle-mark": {
        const target = pane.targetPath()
        if (target) pane.toggleMark(target)
        return NONE
      }
      case "edit": {
        const target = pane.targetPath()
        return target ? { type: "edit", path: target } : NONE
      }
      case "open": {
        const target = pane.targetPath()
        return target ? { type: "open", path: target } : NONE
      }
      case "switch-pane": {
        const { index } = action
        this.navigate(() => this.panes.switchTo(index))
        return NONE
      }
      case "next-pane":
        this.navigate(() => this.panes.next())
        return NONE
      case "previous-pane":
        this.navigate(() => this.panes.previous())
        return NONE
      case "command-mode":
        this.modeState = commandMode()
        return NONE
    }
  }

  private navigate(operation: () => void): void {
    try {
      operation()
    } catch (error) {
      if (error instanceof NotADirectoryError) {
        debugLog({ ignored: error.name, path: error.path })
        return
      }
      if (error instanceof IoError) {
        debugLog({ ioError: error.code, path: error.path })
        this.statusLine = error.message
        return
      }
      if (error instanceof PaneIndexError) {
        this.statusLine = `No pane ${error.index + 1}`
        return
      }
      throw error
    }
  }
}
