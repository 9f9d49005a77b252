export type ParsedCommand =
  | { readonly type: "empty" }
  | { readonly type: "cd"; readonly path: string }
  | { readonly type: "hidden" }
  | { readonly type: "mark" }
  | { readonly type: "unmark" }
  | { readonly type: "pane"; readonly index: number | null }
  | { readonly type: "edit" }
  | { readonly type: "open" }
  | { readonly type: "quit" }
  | { readonly type: "unknown"; readonly name: string }

const parsePaneNumber = (value: string): number | null => {
  if (!/^\d+$/.test(value)) return null
  return Number(value) - 1
}

export const parseCommand = (text: string): ParsedCommand => {
  const trimmed = text.trim()
  if (!trimmed) return { type: "empty" }
  const [name = "", ...rest] = trimmed.split(/\s+/)
  const argument = trimmed.slice(name.length).trim()
  switch (name) {
    case "cd":
      return { type: "cd", path: argument || "~" }
    case "hidden":
      return { type: "hidden" }
    case "mark":
      return { type: "mark" }
    case "unmark":
      return { type: "unmark" }
    case "pane":
      return { type: "pane", index: rest.length === 1 ? parsePaneNumber(rest[0] ?? "") : null }
    case "edit":
      return { type: "edit" }
    case "open":
      return { type: "open" }
    case "q":
    case "quit":
      return { type: "quit" }
    default:
      return { type: "unknown", name }
  }
}
