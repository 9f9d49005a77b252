import { describe, expect, it } from "vitest"
import { IoError, PaneIndexError } from "../../src/browser/errors.js"
import { DEFAULT_PANE_COUNT, MAX_PANE_COUNT, PaneSet } from "../../src/browser/paneSet.js"
import { createFakeFilesystem, type FakeDirectory } from "../helpers/fakeTree.js"

const setup = (count?: number) => {
  const work: FakeDirectory = { alpha: {}, beta: {}, "readme.md": "file" }
  const fs = createFakeFilesystem({ work })
  const panes = PaneSet.open("/work", { lister: fs.lister, viewportHeight: 10, count })
  return { fs, work, panes }
}

describe("PaneSet", () => {
  it("opens four panes at the starting directory by default", () => {
    const { panes, fs } = setup()
    expect(DEFAULT_PANE_COUNT).toBe(4)
    expect(panes.count).toBe(4)
    expect(panes.activeIndex).toBe(0)
    expect(fs.calls).toEqual(["/work", "/work", "/work", "/work"])
    for (let index = 0; index < panes.count; index += 1) {
      expect(panes.pane(index).currentDir).toBe("/work")
    }
  })

  it("bounds the pane count", () => {
    expect(setup(0).panes.count).toBe(1)
    expect(setup(20).panes.count).toBe(MAX_PANE_COUNT)
  })

  it("keeps panes independent", () => {
    const { panes } = setup()
    panes.active().cursorDown(1)
    panes.active().enterChild("beta")
    expect(panes.pane(1).cursor).toBe(0)
    expect(panes.pane(1).currentDir).toBe("/work")
    expect(panes.activeDirectory()).toBe("/work/beta")
  })

  it("rejects out-of-range pane indexes without changing the active pane", () => {
    const { panes } = setup()
    expect(() => panes.switchTo(4)).toThrow(PaneIndexError)
    expect(() => panes.switchTo(-1)).toThrow(PaneIndexError)
    expect(() => panes.pane(1.5)).toThrow(PaneIndexError)
    expect(panes.activeIndex).toBe(0)
  })

  it("re-reads a pane when it becomes active", () => {
    const { panes, work, fs } = setup()
    work.gamma = {}
    expect(panes.pane(2).directory.map((entry) => entry.name)).toEqual(["alpha", "beta", "readme.md"])
    const callsBefore = fs.calls.length
    panes.switchTo(2)
    expect(panes.activeIndex).toBe(2)
    expect(fs.calls.length).toBe(callsBefore + 1)
    expect(panes.active().directory.map((entry) => entry.name)).toEqual(["alpha", "beta", "gamma", "readme.md"])
    expect(panes.pane(1).directory).toHaveLength(3)
  })

  it("surfaces read failures on activation but still activates the pane", () => {
    const { panes, fs } = setup()
    fs.unreadable.add("/work")
    expect(() => panes.switchTo(3)).toThrow(IoError)
    expect(panes.activeIndex).toBe(3)
    expect(panes.active().directory).toHaveLength(3)
  })

  it("cycles through panes in both directions", () => {
    const { panes } = setup()
    panes.previous()
    expect(panes.activeIndex).toBe(3)
    panes.next()
    expect(panes.activeIndex).toBe(0)
    panes.next()
    panes.next()
    expect(panes.activeIndex).toBe(2)
  })

  it("re-reads the pane reached by cycling", () => {
    const { panes, work } = setup()
    work.gamma = {}
    panes.next()
    expect(panes.activeIndex).toBe(1)
    expect(panes.active().directory.map((entry) => entry.name)).toEqual(["alpha", "beta", "gamma", "readme.md"])
    panes.previous()
    expect(panes.active().directory.map((entry) => entry.name)).toEqual(["alpha", "beta", "gamma", "readme.md"])
  })

  it("applies the viewport height to every pane", () => {
    const { panes } = setup()
    panes.setViewportHeight(7)
    expect(panes.pane(0).viewportHeight).toBe(7)
    expect(panes.pane(3).viewportHeight).toBe(7)
  })
})
