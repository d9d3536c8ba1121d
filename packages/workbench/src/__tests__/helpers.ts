import { z } from 'zod'
import type { LogSink } from '../logger.js'

const logEventSchema = z.record(z.unknown())

export interface CaptureSink extends LogSink {
  lines: string[]
  /** Parsed events, in order. */
  events(): Array<Record<string, unknown>>
}

export function captureSink(): CaptureSink {
  const lines: string[] = []
  return {
    lines,
    write(line: string) {
      lines.push(line)
    },
    events: () => lines.map((line) => logEventSchema.parse(JSON.parse(line))),
  }
}
