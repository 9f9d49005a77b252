import path from "node:path"
import { DirectoryMemory } from "./directoryMemory.js"
import { listDirectory } from "./entryLister.js"
import { NotADirectoryError } from "./errors.js"
import { buildListing } from "./listing.js"
import { orderEntries } from "./ordering.js"
import type { DirectoryState, Entry, EntryLister, ListingRow } from "./types.js"

// Paging jump when the cursor would leave the window; independent of the requested amount.
export const PAGE_STEP = 10

export interface PaneStateOptions {
  readonly lister?: EntryLister
  readonly viewportHeight?: number
}

/**
 * One browsing context: a directory snapshot plus cursor, scroll and marks.
 *
 * The visible window is `directory.slice(scroll, scroll + viewportHeight + 1)`
 * and `cursor` indexes into it. Every navigation reads the new listing before
 * touching any field, so a failed read leaves the pane where it was.
 */
export class PaneState {
  private dir: string
  private entries: Entry[]
  private cursorIndex = 0
  private scrollOffset = 0
  private height: number
  private hidden = false
  private activeMarks = new Set<string>()
  private readonly memory = new DirectoryMemory()
  private readonly lister: EntryLister

  private constructor(dir: string, entries: Entry[], lister: EntryLister, height: number) {
    this.dir = dir
    this.entries = entries
    this.lister = lister
    this.height = height
  }

  /** Opens a pane at `dir`; an unreadable directory throws `IoError`. */
  static open(dir: string, options: PaneStateOptions = {}): PaneState {
    const lister = options.lister ?? listDirectory
    const resolved = path.resolve(dir)
    const entries = orderEntries(lister(resolved), false)
    return new PaneState(resolved, entries, lister, Math.max(0, options.viewportHeight ?? 0))
  }

  get currentDir(): string {
    return this.dir
  }

  get directory(): ReadonlyArray<Entry> {
    return this.entries
  }

  get cursor(): number {
    return this.cursorIndex
  }

  get scroll(): number {
    return this.scrollOffset
  }

  get viewportHeight(): number {
    return this.height
  }

  get showHidden(): boolean {
    return this.hidden
  }

  get position(): number {
    return this.scrollOffset + this.cursorIndex
  }

  visibleEntries(): ReadonlyArray<Entry> {
    return this.entries.slice(this.scrollOffset, this.scrollOffset + this.height + 1)
  }

  target(): Entry | undefined {
    if (this.cursorIndex > this.height) return undefined
    return this.entries[this.position]
  }

  targetPath(): string | undefined {
    return this.target()?.path
  }

  listing(): ListingRow[] {
    return buildListing({
      window: this.visibleEntries(),
      cursor: this.cursorIndex,
      isMarked: (entryPath) => this.activeMarks.has(entryPath),
    })
  }

  setViewportHeight(rows: number): void {
    this.height = Math.max(0, Math.floor(rows))
    if (this.cursorIndex > this.height) {
      this.scrollOffset += this.cursorIndex - this.height
      this.cursorIndex = this.height
    }
    this.clampCursor()
  }

  cursorUp(amount: number): void {
    if (this.cursorIndex < amount && this.scrollOffset > 0) {
      const room = this.height - this.cursorIndex
      const step = Math.min(PAGE_STEP, this.scrollOffset, Math.max(room, 1))
      this.scrollOffset -= step
      this.cursorIndex = Math.min(this.height, this.cursorIndex + step)
      return
    }
    this.cursorIndex = Math.max(0, this.cursorIndex - amount)
  }

  cursorDown(amount: number): void {
    const last = this.entries.length - 1
    if (this.position >= last) return
    if (this.cursorIndex + amount > this.height) {
      const step = Math.min(PAGE_STEP, Math.max(this.cursorIndex, 1))
      this.cursorIndex = Math.max(0, this.cursorIndex - step)
      this.scrollOffset += step
    } else {
      this.cursorIndex += amount
    }
    if (this.position > last) {
      if (this.scrollOffset > last) {
        this.scrollOffset = last
      }
      this.cursorIndex = last - this.scrollOffset
    }
  }

  /** Pulls the cursor back onto the listing when nothing sits under it. */
  clampCursor(): void {
    if (this.target()) return
    this.scrollOffset = 0
    this.cursorIndex = Math.max(0, Math.min(this.height, this.entries.length - 1))
  }

  enterChild(name: string): void {
    const entry = this.entries.find((candidate) => candidate.name === name)
    if (!entry || !entry.isDir) {
      throw new NotADirectoryError(path.join(this.dir, name))
    }
    this.moveTo(path.join(this.dir, name))
  }

  enterTarget(): void {
    const target = this.target()
    if (!target) {
      throw new NotADirectoryError(this.dir)
    }
    this.enterChild(target.name)
  }

  leaveToParent(): void {
    const child = this.dir
    const parent = path.dirname(child)
    const remembered = this.memory.has(parent)
    this.moveTo(parent)
    if (!remembered && parent !== child) {
      this.focusPath(child)
    }
  }

  changeDirectory(target: string): void {
    this.moveTo(path.resolve(this.dir, target))
  }

  toggleHidden(): void {
    const nextHidden = !this.hidden
    const entries = this.read(this.dir, nextHidden)
    this.memory.save(this.dir, { ...this.snapshot(), showHidden: nextHidden })
    this.entries = entries
    this.restore(this.memory.lookup(this.dir))
  }

  /** Re-reads the current directory in place, keeping the position where possible. */
  refresh(): void {
    this.entries = this.read(this.dir, this.hidden)
    this.clampCursor()
  }

  toggleMark(entryPath: string): void {
    if (this.activeMarks.has(entryPath)) {
      this.activeMarks.delete(entryPath)
    } else {
      this.activeMarks.add(entryPath)
    }
  }

  clearMarks(): void {
    this.activeMarks.clear()
  }

  isMarked(entryPath: string): boolean {
    return this.activeMarks.has(entryPath)
  }

  marks(): ReadonlySet<string> {
    return this.activeMarks
  }

  private read(dir: string, showHidden: boolean): Entry[] {
    return orderEntries(this.lister(dir), showHidden)
  }

  private snapshot(): DirectoryState {
    return {
      cursor: this.cursorIndex,
      scroll: this.scrollOffset,
      showHidden: this.hidden,
      marks: this.activeMarks,
    }
  }

  private restore(state: DirectoryState): void {
    this.cursorIndex = state.cursor
    this.scrollOffset = state.scroll
    this.hidden = state.showHidden
    this.activeMarks = new Set(state.marks)
    this.clampCursor()
  }

  private moveTo(nextDir: string): void {
    this.memory.save(this.dir, this.snapshot())
    const remembered = this.memory.lookup(nextDir)
    const entries = this.read(nextDir, remembered.showHidden)
    this.dir = nextDir
    this.entries = entries
    this.restore(remembered)
  }

  private focusPath(entryPath: string): void {
    const index = this.entries.findIndex((entry) => entry.path === entryPath)
    if (index < 0) return
    this.scrollOffset = Math.max(0, index - this.height)
    this.cursorIndex = index - this.scrollOffset
  }
}
