import path from "node:path"
import type { DirectoryState } from "./types.js"

export const DEFAULT_DIRECTORY_STATE: DirectoryState = {
  cursor: 0,
  scroll: 0,
  showHidden: false,
  marks: new Set<string>(),
}

const normalizeKey = (dir: string): string => path.resolve(dir)

/**
 * Remembered viewport state per directory, owned by a single pane.
 * Entries are created lazily and kept for the lifetime of the pane.
 */
export class DirectoryMemory {
  private readonly entries = new Map<string, DirectoryState>()

  get size(): number {
    return this.entries.size
  }

  has(dir: string): boolean {
    return this.entries.has(normalizeKey(dir))
  }

  lookup(dir: string): DirectoryState {
    return this.entries.get(normalizeKey(dir)) ?? DEFAULT_DIRECTORY_STATE
  }

  save(dir: string, state: DirectoryState): void {
    this.entries.set(normalizeKey(dir), {
      cursor: state.cursor,
      scroll: state.scroll,
      showHidden: state.showHidden,
      marks: new Set(state.marks),
    })
  }
}
