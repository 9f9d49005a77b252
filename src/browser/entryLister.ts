import { readdirSync, statSync, type Dirent } from "node:fs"
import path from "node:path"
import { toIoError } from "./errors.js"
import type { Entry } from "./types.js"

const resolvesToDirectory = (entryPath: string): boolean => {
  try {
    return statSync(entryPath).isDirectory()
  } catch {
    // dangling links and unreadable targets list as files
    return false
  }
}

const classify = (dir: string, dirent: Dirent): Entry => {
  const entryPath = path.join(dir, dirent.name)
  const isDir = dirent.isDirectory() || ((dirent.isSymbolicLink() || isUnknown(dirent)) && resolvesToDirectory(entryPath))
  return { path: entryPath, name: dirent.name, isDir }
}

const isUnknown = (dirent: Dirent): boolean =>
  !dirent.isFile() &&
  !dirent.isDirectory() &&
  !dirent.isSymbolicLink() &&
  !dirent.isFIFO() &&
  !dirent.isSocket() &&
  !dirent.isCharacterDevice() &&
  !dirent.isBlockDevice()

/**
 * Lists the immediate children of `dir`. Read failures surface as `IoError`
 * with the errno code; nothing is retried and no partial result is returned.
 */
export const listDirectory = (dir: string): Entry[] => {
  let dirents: Dirent[]
  try {
    dirents = readdirSync(dir, { withFileTypes: true })
  } catch (error) {
    throw toIoError(dir, error)
  }
  return dirents.map((dirent) => classify(dir, dirent))
}
