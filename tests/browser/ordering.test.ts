import { describe, expect, it } from "vitest"
import { compareEntries, isHidden, orderEntries } from "../../src/browser/ordering.js"
import type { Entry } from "../../src/browser/types.js"
import { seededRandom } from "../helpers/fakeTree.js"

const entry = (name: string, isDir: boolean): Entry => ({ path: `/tmp/${name}`, name, isDir })

const scenario: Entry[] = [entry(".git", true), entry("README.md", false), entry("src", true), entry(".env", false)]

const names = (entries: ReadonlyArray<Entry>): string[] => entries.map((item) => item.name)

describe("orderEntries", () => {
  it("drops hidden entries when hidden entries are off", () => {
    expect(names(orderEntries(scenario, false))).toEqual(["src", "README.md"])
  })

  it("sorts hidden entries after visible ones within each kind", () => {
    expect(names(orderEntries(scenario, true))).toEqual(["src", ".git", "README.md", ".env"])
  })

  it("compares names byte-wise rather than by locale", () => {
    const entries = ["b", "a", "Z", "é", "_x"].map((name) => entry(name, false))
    expect(names(orderEntries(entries, false))).toEqual(["Z", "_x", "a", "b", "é"])
  })

  it("does not mutate its input", () => {
    const input = [...scenario]
    orderEntries(input, true)
    expect(input).toEqual(scenario)
  })

  it("yields the same sequence for any input permutation", () => {
    const random = seededRandom(7)
    const expected = names(orderEntries(scenario, true))
    for (let round = 0; round < 20; round += 1) {
      const shuffled = [...scenario].sort(() => random() - 0.5)
      expect(names(orderEntries(shuffled, true))).toEqual(expected)
    }
  })

  it("keeps directories, then visible, then byte order for generated listings", () => {
    const random = seededRandom(42)
    const alphabet = ["a", "B", "c", ".", "_", "1", "z"]
    for (let round = 0; round < 50; round += 1) {
      const generated = new Map<string, Entry>()
      const size = Math.floor(random() * 20)
      for (let index = 0; index < size; index += 1) {
        const length = 1 + Math.floor(random() * 4)
        let name = ""
        for (let char = 0; char < length; char += 1) {
          name += alphabet[Math.floor(random() * alphabet.length)]
        }
        generated.set(name, entry(name, random() < 0.4))
      }
      const all = orderEntries([...generated.values()], true)
      const visibleOnly = orderEntries([...generated.values()], false)

      expect(visibleOnly.some((item) => isHidden(item.name))).toBe(false)
      expect(names(visibleOnly)).toEqual(names(all.filter((item) => !isHidden(item.name))))
      expect(all.length).toBe(generated.size)
      for (let index = 1; index < all.length; index += 1) {
        const previous = all[index - 1]
        const current = all[index]
        if (!previous || !current) continue
        expect(compareEntries(previous, current)).toBeLessThan(0)
        if (previous.isDir === current.isDir && isHidden(previous.name) === isHidden(current.name)) {
          expect(Buffer.compare(Buffer.from(previous.name), Buffer.from(current.name))).toBe(-1)
        }
        if (!previous.isDir) {
          expect(current.isDir).toBe(false)
        }
      }
    }
  })
})

describe("isHidden", () => {
  it("treats a leading dot as hidden", () => {
    expect(isHidden(".env")).toBe(true)
    expect(isHidden("env.")).toBe(false)
  })
})
