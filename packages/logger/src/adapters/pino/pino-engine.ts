import pino, { type Logger as PinoBaseLogger } from "pino"
import { prettyFactory } from "pino-pretty"
import { LoggerBuildError } from "../../core/errors"
import { parseSeverity } from "../../core/levels"
import { parseFormat } from "../../core/options"
import { Sampler } from "../../core/sampler"
import type { Severity } from "../../ports/log-level"
import type { LoggerOptions } from "../../ports/logger-options"
import type { LogSink } from "../../ports/sink"

export const customLevels = { dpanic: 52, panic: 55 } as const

export type PinoEngine = PinoBaseLogger<keyof typeof customLevels>

export type LoggerDeps = {
  /** Opens "stdout", "stderr" or a file path. */
  openSink?: (path: string) => LogSink

  /** Called with 1 after a fatal record. Defaults to `process.exit`. */
  exit?: (code: number) => void

  /** Clock for timestamps and sampling, in epoch milliseconds. */
  now?: () => number
}

/**
 * Everything a logger and the loggers derived from it share.
 */
export type EngineState = {
  readonly engine: PinoEngine
  readonly options: Readonly<LoggerOptions>
  readonly threshold: Severity
  readonly sampler: Sampler
  readonly sinks: readonly LogSink[]
  readonly errorSinks: readonly LogSink[]
  readonly exit: (code: number) => void

  /** Closes the file sinks; stdout and stderr stay open. */
  close(): void
  readonly now: () => number

  /** Writes an internal failure to the error sinks. */
  reportInternal(err: unknown): void
}

export function defaultOpenSink(path: string): LogSink {
  switch (path) {
    case "stdout":
      return pino.destination({ dest: 1, sync: true })
    case "stderr":
      return pino.destination({ dest: 2, sync: true })
    default:
      return pino.destination({ dest: path, sync: true, mkdir: true, append: true })
  }
}

type OpenedSink = { path: string; sink: LogSink }

// The process's own stdout and stderr stay open.
function isStandardStream(path: string): boolean {
  return path === "stdout" || path === "stderr"
}

function closeSinks(opened: readonly OpenedSink[]): void {
  for (const { path, sink } of opened) {
    if (isStandardStream(path)) continue

    try {
      sink.end?.()
    } catch (err) {
      process.emitWarning(`cannot close log sink "${path}": ${errorMessage(err)}`)
    }
  }
}

/**
 * Opens every path, appending to `opened`. When one fails, the sinks opened
 * so far are closed before the error is thrown.
 */
function openSinks(
  paths: readonly string[],
  open: (path: string) => LogSink,
  opened: OpenedSink[],
): LogSink[] {
  return paths.map((path) => {
    try {
      const sink = open(path)
      opened.push({ path, sink })

      return sink
    } catch (err) {
      closeSinks(opened)
      throw new LoggerBuildError(path, err)
    }
  })
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}

function writeToErrorSinks(errorSinks: readonly LogSink[], line: string): void {
  for (const sink of errorSinks) {
    try {
      sink.write(line)
    } catch (err) {
      process.emitWarning(`log error sink failed: ${errorMessage(err)}; dropped: ${line.trimEnd()}`)
    }
  }
}

function fanOut(
  sinks: readonly LogSink[],
  render: (line: string) => string,
  reportInternal: (err: unknown) => void,
): { write: (line: string) => void } {
  return {
    write(line: string) {
      let rendered: string

      try {
        rendered = render(line)
      } catch (err) {
        reportInternal(err)
        return
      }

      for (const sink of sinks) {
        try {
          sink.write(rendered)
        } catch (err) {
          reportInternal(err)
        }
      }
    },
  }
}

function consoleRenderer(enableColor: boolean): (line: string) => string {
  const pretty = prettyFactory({
    colorize: enableColor,
    customLevels: "dpanic:52,panic:55",
    useOnlyCustomProps: false,
    messageKey: "message",
    timestampKey: "timestamp",
    singleLine: true,
  })

  return (line) => pretty(line)
}

/**
 * Opens the sinks and builds the pino logger behind a facade.
 *
 * An unrecognised level builds as "info" and an unrecognised format as
 * "console"; only a sink that cannot be opened fails the build.
 *
 * @throws {LoggerBuildError} when a sink cannot be opened
 */
export function createEngineState(opts: LoggerOptions, deps: LoggerDeps = {}): EngineState {
  const open = deps.openSink ?? defaultOpenSink
  const now = deps.now ?? Date.now
  const threshold = parseSeverity(opts.level) ?? "info"
  const format = parseFormat(opts.format) ?? "console"

  const opened: OpenedSink[] = []
  const sinks = openSinks(opts.outputPaths, open, opened)
  const errorSinks = openSinks(opts.errorOutputPaths, open, opened)

  const reportInternal = (err: unknown) => {
    writeToErrorSinks(errorSinks, `${new Date(now()).toISOString()}\twrite error: ${errorMessage(err)}\n`)
  }

  for (const sink of sinks) {
    sink.on?.("error", reportInternal)
  }

  const render = format === "json" ? (line: string) => line : consoleRenderer(opts.enableColor)

  const engine = pino<keyof typeof customLevels>(
    {
      level: threshold,
      customLevels,
      base: null,
      messageKey: "message",
      timestamp: () => `,"timestamp":"${new Date(now()).toISOString()}"`,
      ...(format === "json" && {
        formatters: { level: (label: string) => ({ level: label.toUpperCase() }) },
      }),
    },
    fanOut(sinks, render, reportInternal),
  )

  return {
    engine,
    options: { ...opts, level: threshold, format },
    threshold,
    sampler: new Sampler({ now }),
    sinks,
    errorSinks,
    exit: deps.exit ?? ((code) => process.exit(code)),
    close: () => closeSinks(opened),
    now,
    reportInternal,
  }
}

/**
 * Resolves once every output and error sink has flushed. Flush failures go
 * to the error sinks.
 */
export async function flushSinks(state: EngineState): Promise<void> {
  const all = [...state.sinks, ...state.errorSinks]

  await Promise.all(
    all.map(
      (sink) =>
        new Promise<void>((resolve) => {
          if (!sink.flush) {
            resolve()
            return
          }

          try {
            sink.flush((err) => {
              if (err) state.reportInternal(err)
              resolve()
            })
          } catch (err) {
            state.reportInternal(err)
            resolve()
          }
        }),
    ),
  )
}

export function flushSinksSync(state: EngineState): void {
  for (const sink of [...state.sinks, ...state.errorSinks]) {
    try {
      sink.flushSync?.()
    } catch (err) {
      state.reportInternal(err)
    }
  }
}
