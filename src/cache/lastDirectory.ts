import { promises as fs } from "node:fs"
import path from "node:path"
import { loadAppConfig } from "../config/appConfig.js"

const ensureDir = async (filePath: string): Promise<void> => {
  await fs.mkdir(path.dirname(filePath), { recursive: true })
}

/** Records the directory a shell wrapper should `cd` into after exit. */
export const writeLastDirectory = async (dir: string, filePath: string = loadAppConfig().lastDirFile): Promise<void> => {
  await ensureDir(filePath)
  await fs.writeFile(filePath, dir, "utf8")
}

export const readLastDirectory = async (filePath: string = loadAppConfig().lastDirFile): Promise<string | null> => {
  try {
    const raw = await fs.readFile(filePath, "utf8")
    const trimmed = raw.trim()
    return trimmed.length > 0 ? trimmed : null
  } catch {
    return null
  }
}
