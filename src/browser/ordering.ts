import type { Entry } from "./types.js"

export const isHidden = (name: string): boolean => name.startsWith(".")

const compareBytes = (a: string, b: string): number => Buffer.compare(Buffer.from(a, "utf8"), Buffer.from(b, "utf8"))

/** Directories first, then visible before hidden, then byte-wise by name. */
export const compareEntries = (a: Entry, b: Entry): number => {
  if (a.isDir !== b.isDir) return a.isDir ? -1 : 1
  const aHidden = isHidden(a.name)
  const bHidden = isHidden(b.name)
  if (aHidden !== bHidden) return aHidden ? 1 : -1
  return compareBytes(a.name, b.name)
}

export const orderEntries = (entries: ReadonlyArray<Entry>, showHidden: boolean): Entry[] =>
  entries.filter((entry) => showHidden || !isHidden(entry.name)).sort(compareEntries)
