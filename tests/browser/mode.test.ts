import { describe, expect, it } from "vitest"
import {
  appendInput,
  cancelCommand,
  commandMode,
  eraseInput,
  normalMode,
  submitCommand,
} from "../../src/browser/mode.js"

describe("mode transitions", () => {
  it("ignores text input while in normal mode", () => {
    const mode = normalMode()
    expect(appendInput(mode, "x")).toEqual({ kind: "normal" })
    expect(eraseInput(mode)).toEqual({ kind: "normal" })
    expect(submitCommand(mode)).toEqual({ mode: { kind: "normal" }, command: null })
  })

  it("accumulates and erases command text", () => {
    let mode = commandMode()
    mode = appendInput(mode, "cd")
    mode = appendInput(mode, " /tmpx")
    mode = eraseInput(mode)
    expect(mode).toEqual({ kind: "command", buffer: "cd /tmp" })
  })

  it("erases whole characters", () => {
    expect(eraseInput(commandMode("café"))).toEqual({ kind: "command", buffer: "caf" })
    expect(eraseInput(commandMode(""))).toEqual({ kind: "command", buffer: "" })
  })

  it("returns to normal with the text on submit", () => {
    expect(submitCommand(commandMode("hidden"))).toEqual({ mode: { kind: "normal" }, command: "hidden" })
  })

  it("discards the text on cancel", () => {
    expect(cancelCommand(commandMode("quit"))).toEqual({ kind: "normal" })
  })
})
