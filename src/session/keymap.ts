import type { Key } from "ink"
import { COMMAND_TRIGGER } from "../browser/mode.js"
import { PAGE_STEP } from "../browser/paneState.js"

export type KeyPress = Partial<Key>

export type NormalAction =
  | { readonly type: "quit" }
  | { readonly type: "cursor-up"; readonly amount: number }
  | { readonly type: "cursor-down"; readonly amount: number }
  | { readonly type: "leave" }
  | { readonly type: "enter" }
  | { readonly type: "toggle-hidden" }
  | { readonly type: "toggle-mark" }
  | { readonly type: "edit" }
  | { readonly type: "open" }
  | { readonly type: "switch-pane"; readonly index: number }
  | { readonly type: "next-pane" }
  | { readonly type: "previous-pane" }
  | { readonly type: "command-mode" }

export const KEY_HINT = "j/k move  h/l leave/enter  . hidden  space mark  e edit  o open  1-9 pane  : command  q quit"

export const resolveNormalKey = (input: string, key: KeyPress): NormalAction | null => {
  if (key.ctrl) {
    return input.toLowerCase() === "c" ? { type: "quit" } : null
  }
  if (key.upArrow) return { type: "cursor-up", amount: 1 }
  if (key.downArrow) return { type: "cursor-down", amount: 1 }
  if (key.pageUp) return { type: "cursor-up", amount: PAGE_STEP }
  if (key.pageDown) return { type: "cursor-down", amount: PAGE_STEP }
  if (key.leftArrow) return { type: "leave" }
  if (key.rightArrow || key.return) return { type: "enter" }
  if (key.tab) return key.shift ? { type: "previous-pane" } : { type: "next-pane" }
  if (key.meta || key.escape) return null
  if (/^[1-9]$/.test(input)) {
    return { type: "switch-pane", index: Number(input) - 1 }
  }
  switch (input) {
    case "q":
      return { type: "quit" }
    case "k":
      return { type: "cursor-up", amount: 1 }
    case "j":
      return { type: "cursor-down", amount: 1 }
    case "h":
      return { type: "leave" }
    case "l":
      return { type: "enter" }
    case ".":
      return { type: "toggle-hidden" }
    case " ":
    case "m":
      return { type: "toggle-mark" }
    case "e":
      return { type: "edit" }
    case "o":
      return { type: "open" }
    case COMMAND_TRIGGER:
      return { type: "command-mode" }
    default:
      return null
  }
}
