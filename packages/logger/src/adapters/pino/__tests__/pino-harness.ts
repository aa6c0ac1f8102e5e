import { Writable } from "node:stream"

import type { CapturedLog, LoggerHarness } from "../../../ports/__tests__/logger-harness"
import { type LogLevelName, logLevelNames } from "../../../ports/log-level"
import { PinoLogger } from "../pino-logger"

// pino numbers levels 10 (trace) through 60 (fatal)
const namesByNumber = new Map<unknown, LogLevelName>(
  logLevelNames.map((name, i) => [(i + 1) * 10, name]),
)

function levelName(value: unknown): LogLevelName {
  return namesByNumber.get(value) ?? "info"
}

export function pinoHarness(): LoggerHarness {
  return {
    name: "PinoLogger",
    create: (level) => {
      const captured: CapturedLog[] = []

      const destination = new Writable({
        write(chunk, _encoding, done) {
          const { level: raw, msg, ...fields }: Record<string, unknown> = JSON.parse(
            String(chunk),
          )

          captured.push({ level: levelName(raw), message: String(msg), fields })
          done()
        },
      })

      return {
        logger: new PinoLogger({ destination }, { level, prettify: false }, {}),
        entries: () => [...captured],
        reset: () => {
          captured.length = 0
        },
      }
    },
  }
}
