import fs from "node:fs"
import stream from "node:stream"
import { configure, getConsoleSink, getStreamSink } from "@logtape/logtape"

const LOG_PIPE_PATH = "./log.jsonl"

const logPipeStream = fs.createWriteStream(LOG_PIPE_PATH, { flags: "a" })

// Configure LogTape for tests; `reset` since every test file runs this again
await configure({
  reset: true,
  sinks: {
    console: getConsoleSink(),
    file: getStreamSink(stream.Writable.toWeb(logPipeStream), {
      formatter: record => `${JSON.stringify(record)}\n`,
    }),
  },
  loggers: [
    {
      category: ["questline"],
      lowestLevel: "trace",
      sinks: ["file"],
    },
    {
      category: ["logtape", "meta"],
      lowestLevel: "warning",
      sinks: ["console"],
    },
  ],
})
