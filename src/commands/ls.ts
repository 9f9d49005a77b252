import { Args, Command, Options } from "@effect/cli"
import { Console, Effect, Option } from "effect"
import path from "node:path"
import { listDirectory } from "../browser/entryLister.js"
import { IoError } from "../browser/errors.js"
import { orderEntries } from "../browser/ordering.js"
import type { Entry } from "../browser/types.js"
import { paintSegment } from "../ui/theme.js"

const dirArg = Args.text({ name: "dir" }).pipe(Args.optional)
const allOption = Options.boolean("all").pipe(Options.withAlias("a"))
const outputOption = Options.choice("output", ["text", "json"]).pipe(Options.withDefault("text"))

export const formatEntries = (entries: ReadonlyArray<Entry>, color = false): string => {
  if (entries.length === 0) {
    return "(empty)"
  }
  return entries
    .map((entry) => {
      const name = entry.isDir ? `${entry.name}/` : entry.name
      return color ? paintSegment({ text: name, style: entry.isDir ? "directory" : "file" }) : name
    })
    .join("\n")
}

export const lsCommand = Command.make("ls", { dir: dirArg, all: allOption, output: outputOption }, ({ dir, all, output }) =>
  Effect.gen(function* () {
    const target = path.resolve(Option.getOrElse(dir, () => process.cwd()))
    const entries = yield* Effect.try({
      try: () => orderEntries(listDirectory(target), all),
      catch: (error) => (error instanceof IoError ? error : new IoError(target, "EIO", error)),
    })
    if (output === "json") {
      yield* Console.log(JSON.stringify(entries, null, 2))
    } else {
      yield* Console.log(formatEntries(entries, process.stdout.isTTY === true))
    }
  }),
)
