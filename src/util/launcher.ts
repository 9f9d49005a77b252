import { spawn } from "node:child_process"

export interface LaunchResult {
  readonly code: number | null
}

// "code --wait" style values carry their own arguments.
const splitCommand = (command: string): [string, string[]] => {
  const [program = "", ...args] = command.trim().split(/\s+/)
  return [program, args]
}

/** Runs the editor on `target` with the terminal handed over until it exits. */
export const launchEditor = (editor: string, target: string): Promise<LaunchResult> => {
  const [program, args] = splitCommand(editor)
  const child = spawn(program, [...args, target], { stdio: "inherit" })
  return new Promise<LaunchResult>((resolve, reject) => {
    child.once("error", (err) => reject(err))
    child.once("exit", (code) => resolve({ code }))
  })
}

/** Hands `target` to the platform open handler without waiting for it. */
export const openPath = (opener: string, target: string): Promise<void> => {
  const [program, args] = splitCommand(opener)
  const child = spawn(program, [...args, target], { stdio: "ignore", detached: true })
  return new Promise<void>((resolve, reject) => {
    child.once("error", (err) => reject(err))
    child.once("spawn", () => {
      child.unref()
      resolve()
    })
  })
}
