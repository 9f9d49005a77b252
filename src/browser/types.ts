export interface Entry {
  readonly path: string
  readonly name: string
  readonly isDir: boolean
}

export type EntryLister = (dir: string) => Entry[]

export interface DirectoryState {
  readonly cursor: number
  readonly scroll: number
  readonly showHidden: boolean
  readonly marks: ReadonlySet<string>
}

export type ListingStyle =
  | "file"
  | "file-highlighted"
  | "directory"
  | "directory-highlighted"
  | "marked"
  | "plain"

export interface ListingSegment {
  readonly text: string
  readonly style: ListingStyle
}

export interface ListingRow {
  readonly segments: ReadonlyArray<ListingSegment>
}
