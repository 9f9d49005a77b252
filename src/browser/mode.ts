export type Mode = { readonly kind: "normal" } | { readonly kind: "command"; readonly buffer: string }

export const COMMAND_TRIGGER = ":"

export const normalMode = (): Mode => ({ kind: "normal" })

export const commandMode = (buffer = ""): Mode => ({ kind: "command", buffer })

export const appendInput = (mode: Mode, input: string): Mode =>
  mode.kind === "command" ? commandMode(mode.buffer + input) : mode

export const eraseInput = (mode: Mode): Mode =>
  mode.kind === "command" ? commandMode(Array.from(mode.buffer).slice(0, -1).join("")) : mode

export interface CommandSubmission {
  readonly mode: Mode
  readonly command: string | null
}

/** Leaves Command mode, handing back the buffered text for execution. */
export const submitCommand = (mode: Mode): CommandSubmission =>
  mode.kind === "command" ? { mode: normalMode(), command: mode.buffer } : { mode, command: null }

export const cancelCommand = (mode: Mode): Mode => (mode.kind === "command" ? normalMode() : mode)
