import type { Entry, ListingRow, ListingSegment } from "./types.js"

export interface ListingInput {
  readonly window: ReadonlyArray<Entry>
  readonly cursor: number
  readonly isMarked: (path: string) => boolean
}

const nameSegment = (entry: Entry, highlight: boolean, marked: boolean): ListingSegment => {
  if (highlight) {
    return { text: entry.name, style: entry.isDir ? "directory-highlighted" : "file-highlighted" }
  }
  if (marked) {
    return { text: entry.name, style: "marked" }
  }
  return { text: entry.name, style: entry.isDir ? "directory" : "file" }
}

export const buildListing = ({ window, cursor, isMarked }: ListingInput): ListingRow[] =>
  window.map((entry, line): ListingRow => {
    const name = nameSegment(entry, line === cursor, isMarked(entry.path))
    return { segments: entry.isDir ? [name, { text: "/", style: "plain" }] : [name] }
  })

export const listingText = (rows: ReadonlyArray<ListingRow>): string[] =>
  rows.map((row) => row.segments.map((segment) => segment.text).join(""))
