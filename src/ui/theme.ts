import chalk from "chalk"
import type { ListingSegment, ListingStyle } from "../browser/types.js"

export type ColorMode = "auto" | "none"

export const resolveColorMode = (): ColorMode => {
  const explicit = (process.env.PANEWALK_COLOR ?? "").trim().toLowerCase()
  if (explicit === "none" || explicit === "0" || explicit === "off") return "none"
  if (process.env.NO_COLOR != null && process.env.NO_COLOR !== "") return "none"
  return "auto"
}

export const resolveAsciiOnly = (): boolean => process.env.PANEWALK_ASCII === "1"

export const COLOR_MODE = resolveColorMode()
export const ASCII_ONLY = resolveAsciiOnly()

if (COLOR_MODE === "none") {
  chalk.level = 0
}

export const GLYPHS = {
  separator: ASCII_ONLY ? "|" : "│",
  prompt: ":",
} as const

export const COLORS = {
  title: "greenBright",
  activeTab: "blue",
  muted: "gray",
  error: "red",
} as const

const STYLERS: Record<ListingStyle, (text: string) => string> = {
  file: (text) => chalk.white(text),
  "file-highlighted": (text) => chalk.black.bgWhite(text),
  directory: (text) => chalk.blue.bold(text),
  "directory-highlighted": (text) => chalk.black.bgBlue.bold(text),
  marked: (text) => chalk.yellow(text),
  plain: (text) => text,
}

export const paintSegment = (segment: ListingSegment): string => STYLERS[segment.style](segment.text)

export const paintRow = (segments: ReadonlyArray<ListingSegment>): string => segments.map(paintSegment).join("")
