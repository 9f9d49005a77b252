import { homedir } from "node:os"
import path from "node:path"
import fs from "node:fs"

export interface UserConfigFile {
  readonly paneCount?: number
  readonly editor?: string
  readonly opener?: string
  readonly lastDirFile?: string
}

const resolveConfigPath = (): string => {
  const explicit = process.env.PANEWALK_USER_CONFIG?.trim()
  if (explicit) {
    return path.resolve(explicit)
  }
  return path.join(homedir(), ".panewalk", "config.json")
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value)

const readString = (value: unknown): string | undefined =>
  typeof value === "string" && value.trim().length > 0 ? value.trim() : undefined

export const loadUserConfigSync = (): UserConfigFile => {
  const configPath = resolveConfigPath()
  try {
    if (!fs.existsSync(configPath)) return {}
    const raw = fs.readFileSync(configPath, "utf8")
    const parsed = JSON.parse(raw) as unknown
    if (!isRecord(parsed)) return {}
    const paneCount = typeof parsed.paneCount === "number" ? parsed.paneCount : undefined
    return {
      paneCount,
      editor: readString(parsed.editor),
      opener: readString(parsed.opener),
      lastDirFile: readString(parsed.lastDirFile),
    }
  } catch {
    // unreadable or malformed config falls back to defaults
    return {}
  }
}
