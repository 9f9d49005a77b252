import { PaneIndexError } from "./errors.js"
import { PaneState, type PaneStateOptions } from "./paneState.js"

export const DEFAULT_PANE_COUNT = 4
export const MAX_PANE_COUNT = 9

export interface PaneSetOptions extends PaneStateOptions {
  readonly count?: number
}

export class PaneSet {
  private readonly panes: ReadonlyArray<PaneState>
  private index = 0

  private constructor(panes: ReadonlyArray<PaneState>) {
    this.panes = panes
  }

  /** Creates every pane at `dir`; the first unreadable read throws. */
  static open(dir: string, options: PaneSetOptions = {}): PaneSet {
    const count = Math.min(MAX_PANE_COUNT, Math.max(1, Math.floor(options.count ?? DEFAULT_PANE_COUNT)))
    const panes = Array.from({ length: count }, () => PaneState.open(dir, options))
    return new PaneSet(panes)
  }

  get count(): number {
    return this.panes.length
  }

  get activeIndex(): number {
    return this.index
  }

  pane(index: number): PaneState {
    const pane = this.panes[index]
    if (!Number.isInteger(index) || !pane) {
      throw new PaneIndexError(index, this.panes.length)
    }
    return pane
  }

  active(): PaneState {
    return this.pane(this.index)
  }

  /** Activates pane `index` and re-reads its directory to pick up outside changes. */
  switchTo(index: number): void {
    const pane = this.pane(index)
    this.index = index
    pane.refresh()
  }

  next(): void {
    this.switchTo((this.index + 1) % this.panes.length)
  }

  previous(): void {
    this.switchTo((this.index - 1 + this.panes.length) % this.panes.length)
  }

  setViewportHeight(rows: number): void {
    for (const pane of this.panes) {
      pane.setViewportHeight(rows)
    }
  }

  activeDirectory(): string {
    return this.active().currentDir
  }
}
