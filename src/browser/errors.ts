export class IoError extends Error {
  readonly path: string
  readonly code: string

  constructor(path: string, code: string, cause?: unknown) {
    super(`Cannot read ${path}: ${code}`, { cause })
    this.name = "IoError"
    this.path = path
    this.code = code
  }
}

export class NotADirectoryError extends Error {
  readonly path: string

  constructor(path: string) {
    super(`Not a directory: ${path}`)
    this.name = "NotADirectoryError"
    this.path = path
  }
}

export class PaneIndexError extends Error {
  readonly index: number
  readonly count: number

  constructor(index: number, count: number) {
    super(`Pane ${index} is out of range (0..${count - 1})`)
    this.name = "PaneIndexError"
    this.index = index
    this.count = count
  }
}

const readErrorCode = (error: unknown): string => {
  if (error && typeof error === "object" && "code" in error && typeof error.code === "string") {
    return error.code
  }
  return "EIO"
}

export const toIoError = (path: string, error: unknown): IoError =>
  error instanceof IoError ? error : new IoError(path, readErrorCode(error), error)
