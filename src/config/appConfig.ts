import dotenv from "dotenv"
import { homedir } from "node:os"
import path from "node:path"
import { Context, Effect, Layer } from "effect"
import { DEFAULT_PANE_COUNT, MAX_PANE_COUNT } from "../browser/paneSet.js"
import { loadUserConfigSync } from "./userConfig.js"

dotenv.config()

export interface AppConfig {
  readonly paneCount: number
  readonly editor: string | undefined
  readonly opener: string
  readonly lastDirFile: string
}

const parsePaneCount = (value: unknown): number | undefined => {
  const parsed = typeof value === "string" ? Number(value.trim()) : value
  if (typeof parsed !== "number" || !Number.isInteger(parsed)) return undefined
  if (parsed < 1 || parsed > MAX_PANE_COUNT) return undefined
  return parsed
}

const nonEmpty = (value: string | undefined): string | undefined => {
  const trimmed = value?.trim()
  return trimmed ? trimmed : undefined
}

export const defaultOpener = (platform: NodeJS.Platform = process.platform): string => {
  if (platform === "darwin") return "open"
  if (platform === "win32") return "explorer"
  return "xdg-open"
}

const resolveLastDirFile = (configured: string | undefined): string => {
  const explicit = nonEmpty(process.env.PANEWALK_LAST_DIR_FILE) ?? configured
  if (explicit) {
    return path.resolve(explicit)
  }
  return path.join(homedir(), ".cache", "panewalk", "lastdir")
}

const computeConfig = (): AppConfig => {
  const userConfig = loadUserConfigSync()
  const paneCount =
    parsePaneCount(process.env.PANEWALK_PANE_COUNT) ?? parsePaneCount(userConfig.paneCount) ?? DEFAULT_PANE_COUNT
  const editor =
    nonEmpty(process.env.PANEWALK_EDITOR) ??
    nonEmpty(process.env.VISUAL) ??
    nonEmpty(process.env.EDITOR) ??
    userConfig.editor
  const opener = nonEmpty(process.env.PANEWALK_OPENER) ?? userConfig.opener ?? defaultOpener()
  return {
    paneCount,
    editor,
    opener,
    lastDirFile: resolveLastDirFile(userConfig.lastDirFile),
  }
}

export const AppConfigTag = Context.GenericTag<AppConfig>("AppConfig")

export const AppConfigLayer = Layer.effect(AppConfigTag, Effect.sync(computeConfig))

export const loadAppConfig = (): AppConfig => computeConfig()
