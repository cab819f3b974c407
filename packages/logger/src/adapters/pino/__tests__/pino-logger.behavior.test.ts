import { mkdtempSync, readFileSync, rmSync } from "node:fs"
import { tmpdir } from "node:os"
import { join } from "node:path"
import { runWithLogContext } from "../../../core/context"
import { LoggerBuildError, PanicError } from "../../../core/errors"
import { field } from "../../../core/fields"
import { newOptions } from "../../../core/options"
import type { LoggerOptions } from "../../../ports/logger-options"
import { memorySinks } from "../../../tests/utils/memory-sink"
import type { LoggerDeps } from "../pino-engine"
import { createLogger } from "../pino-logger"

function setup(overrides: Partial<LoggerOptions> = {}, deps: LoggerDeps = {}) {
  const { openSink, get } = memorySinks()
  const exit = vi.fn()

  const logger = createLogger(
    { ...newOptions(), format: "json", ...overrides },
    { openSink, exit, now: () => 0, ...deps },
  )

  return { logger, out: get("stdout"), err: get("stderr"), exit }
}

function capture(fn: () => unknown): unknown {
  try {
    fn()
  } catch (err) {
    return err
  }

  return undefined
}

describe("PinoLogger behavior", () => {
  describe("records", () => {
    it("writes one JSON object per line", () => {
      const { logger, out } = setup({ disableCaller: true })

      logger.info("hello", field.string("k", "v"))

      expect(out.lines).toHaveLength(1)
      expect(out.lines[0]?.endsWith("\n")).toBe(true)
      expect(out.records()[0]).toEqual({
        level: "INFO",
        timestamp: "1970-01-01T00:00:00.000Z",
        message: "hello",
        k: "v",
      })
    })

    it("adds the caller's file and line", () => {
      const { logger, out } = setup()

      logger.info("where")

      expect(out.records()[0]?.caller).toMatch(/^__tests__\/pino-logger\.behavior\.test\.ts:\d+$/)
    })

    it("serializes error fields with their causes", () => {
      const { logger, out } = setup()

      logger.error("failed", field.error(new Error("boom", { cause: new Error("root") })))

      expect(out.records()[0]?.error).toMatchObject({
        type: "Error",
        message: "boom",
        cause: { type: "Error", message: "root" },
      })
    })

    it("renders console format on one line without colour", () => {
      const { logger, out } = setup({ format: "console" })

      logger.info("hello console")

      const line = out.lines[0] ?? ""

      expect(line).toContain("INFO")
      expect(line).toContain("hello console")
      expect(line).not.toContain("\u001b[")
      expect(() => JSON.parse(line)).toThrow()
    })

    it("accepts the format in any case", () => {
      const { logger, out } = setup({ format: "JSON" })

      logger.info("upper")

      expect(out.records()[0]?.message).toBe("upper")
    })
  })

  describe("levels", () => {
    it("builds an unrecognised level as info", () => {
      const { logger, out } = setup({ level: "loud" })

      logger.debug("hidden")
      logger.info("shown")

      expect(logger.options().level).toBe("info")
      expect(out.records().map((r) => r.message)).toEqual(["shown"])
    })

    it("accepts the level in any case", () => {
      const { logger, out } = setup({ level: "WARN" })

      logger.info("hidden")
      logger.warn("shown")

      expect(out.records().map((r) => r.message)).toEqual(["shown"])
    })

    it("emits v(n) above fatal with the fatal label", () => {
      const { logger, out } = setup()

      logger.v(42).info("very loud")

      expect(out.records()[0]?.level).toBe("FATAL")
    })

    it("never escalates from an info logger", () => {
      const { logger, out, exit } = setup()

      expect(() => logger.v(4).info("not a panic")).not.toThrow()
      logger.v(5).info("not fatal")

      expect(out.records().map((r) => r.level)).toEqual(["PANIC", "FATAL"])
      expect(exit).not.toHaveBeenCalled()
    })
  })

  describe("stack traces", () => {
    it("attaches a stack trace to panic records only", () => {
      const { logger, out } = setup()

      logger.warn("warned")
      capture(() => logger.panic("boom"))

      const [warned, panicked] = out.records()

      expect(warned).not.toHaveProperty("stacktrace")
      expect(panicked?.stacktrace).toEqual(expect.stringContaining("pino-logger.behavior.test.ts"))
    })

    it("attaches stack traces from warn upwards in development", () => {
      const { logger, out } = setup({ development: true })

      logger.info("informed")
      logger.warn("warned")

      const [informed, warned] = out.records()

      expect(informed).not.toHaveProperty("stacktrace")
      expect(typeof warned?.stacktrace).toBe("string")
    })

    it("omits stack traces when disabled", () => {
      const { logger, out } = setup({ disableStacktrace: true })

      capture(() => logger.panic("boom"))

      expect(out.records()[0]).not.toHaveProperty("stacktrace")
    })
  })

  describe("escalation", () => {
    it("panic writes, flushes, then throws", () => {
      const { logger, out, err } = setup()

      const thrown = capture(() => logger.panicf("bad %s", "state"))

      expect(thrown).toBeInstanceOf(PanicError)
      expect(thrown).toMatchObject({ code: "log_panic", message: "bad state" })
      expect(out.records()[0]).toMatchObject({ level: "PANIC", message: "bad state" })
      expect(out.flushSyncCount).toBe(1)
      expect(err.flushSyncCount).toBe(1)
    })

    it("panic throws even when the level is disabled", () => {
      const { logger, out } = setup({ level: "fatal" })

      expect(() => logger.panic("quiet")).toThrow(PanicError)
      expect(out.lines).toHaveLength(0)
    })

    it("fatal writes, flushes, then exits with status 1", () => {
      const { logger, out, exit } = setup()

      logger.fatalw("stopping", "code", 3)

      expect(out.records()[0]).toMatchObject({ level: "FATAL", message: "stopping", code: 3 })
      expect(out.flushSyncCount).toBe(1)
      expect(exit).toHaveBeenCalledTimes(1)
      expect(exit).toHaveBeenCalledWith(1)
    })
  })

  describe("self-diagnostics", () => {
    it("reports a typed field passed as a key", () => {
      const { logger, out } = setup()

      logger.infow("saved", field.int("n", 1))

      const [diagnostic, record] = out.records()

      expect(diagnostic).toMatchObject({
        level: "DPANIC",
        message: "strongly-typed Field passed as a key-value pair",
        "ignored field": "n",
      })
      expect(record).toMatchObject({ level: "INFO", message: "saved" })
      expect(record).not.toHaveProperty("n")
    })

    it("reports a non-string key and drops the rest", () => {
      const { logger, out } = setup()

      logger.warnw("saved", "a", 1, 42, "v", "b", 2)

      const [diagnostic, record] = out.records()

      expect(diagnostic).toMatchObject({
        level: "DPANIC",
        message: "non-string key argument passed to logging, ignoring all later arguments",
        "invalid key": 42,
      })
      expect(record).toMatchObject({ level: "WARN", a: 1 })
      expect(record).not.toHaveProperty("b")
    })

    it("is suppressed with the rest when the threshold is above dpanic", () => {
      const { logger, out } = setup({ level: "panic" })

      logger.errorw("ignored", "dangling")
      logger.withValues("dangling")

      expect(out.lines).toHaveLength(0)
    })

    it("skips conversion for disabled records", () => {
      const { logger, out } = setup({ level: "error" })

      logger.infow("hidden", "dangling")

      expect(out.lines).toHaveLength(0)
    })
  })

  describe("sampling", () => {
    it("passes the first 100 repeats per second, then every 100th", () => {
      const { logger, out } = setup()

      for (let i = 0; i < 250; i++) logger.info("same")
      logger.info("different")

      expect(out.lines).toHaveLength(102)
    })

    it("starts counting again on the next tick", () => {
      let now = 0
      const { logger, out } = setup({}, { now: () => now })

      for (let i = 0; i < 150; i++) logger.info("same")
      now = 1000
      logger.info("same")

      expect(out.lines).toHaveLength(101)
    })
  })

  describe("sinks", () => {
    let dir: string

    beforeEach(() => {
      dir = mkdtempSync(join(tmpdir(), "quill-log-"))
    })

    afterEach(() => {
      rmSync(dir, { recursive: true, force: true })
    })

    it("has every record in every file sink after flush()", async () => {
      const a = join(dir, "a.log")
      const b = join(dir, "nested", "b.log")
      const logger = createLogger({
        ...newOptions(),
        format: "json",
        outputPaths: [a, b],
        errorOutputPaths: [],
      })

      logger.info("one")
      logger.info("two")
      await logger.flush()

      for (const path of [a, b]) {
        const messages = readFileSync(path, "utf8")
          .trim()
          .split("\n")
          .map((line) => JSON.parse(line).message)

        expect(messages).toEqual(["one", "two"])
      }

      await logger.close()
    })

    it("flushes output and error sinks", async () => {
      const { logger, out, err } = setup()

      await logger.flush()

      expect(out.flushCount).toBe(1)
      expect(err.flushCount).toBe(1)
    })

    it("fails the build when a sink cannot be opened", () => {
      const thrown = capture(() =>
        createLogger({ ...newOptions(), outputPaths: [dir], errorOutputPaths: [] }),
      )

      expect(thrown).toBeInstanceOf(LoggerBuildError)
      expect(thrown).toMatchObject({ code: "log_sink_open_failed", context: { path: dir } })
      expect(thrown).toHaveProperty("cause", expect.any(Error))
    })

    it("wraps failures of an injected opener", () => {
      const thrown = capture(() =>
        setup(
          {},
          {
            openSink: () => {
              throw new Error("denied")
            },
          },
        ),
      )

      expect(thrown).toBeInstanceOf(LoggerBuildError)
      expect(thrown).toHaveProperty("message", 'cannot open log sink "stdout": denied')
    })

    it("closes the sinks it opened when a later one fails", () => {
      const { get } = memorySinks()

      const thrown = capture(() =>
        createLogger(
          {
            ...newOptions(),
            outputPaths: ["stdout", "/var/log/app.log"],
            errorOutputPaths: ["/denied/errors.log"],
          },
          {
            openSink: (path) => {
              if (path === "/denied/errors.log") throw new Error("EACCES")

              return get(path)
            },
          },
        ),
      )

      expect(thrown).toBeInstanceOf(LoggerBuildError)
      expect(get("/var/log/app.log").endCount).toBe(1)
      expect(get("stdout").endCount).toBe(0)
    })

    it("close() flushes, then closes the file sinks only", async () => {
      const { openSink, get } = memorySinks()
      const logger = createLogger(
        { ...newOptions(), outputPaths: ["stdout", "/var/log/app.log"] },
        { openSink },
      )

      await logger.withName("api").close()

      expect(get("/var/log/app.log").flushCount).toBe(1)
      expect(get("/var/log/app.log").endCount).toBe(1)
      expect(get("stdout").endCount).toBe(0)
      expect(get("stderr").endCount).toBe(0)
    })

    it("routes sink errors to the error sinks", () => {
      const { out, err } = setup()

      out.emitError(new Error("disk full"))

      expect(err.lines).toEqual(["1970-01-01T00:00:00.000Z\twrite error: disk full\n"])
    })

    it("does not throw to the caller when a sink write fails", () => {
      const { logger, out, err } = setup()

      out.failWrites = new Error("EPIPE")

      expect(() => logger.info("lost")).not.toThrow()
      expect(err.lines).toEqual(["1970-01-01T00:00:00.000Z\twrite error: EPIPE\n"])
    })
  })

  describe("context", () => {
    it("fromContext() without an argument reads the async context", () => {
      const { logger, out } = setup()

      runWithLogContext({ requestID: "req-1", username: "ana" }, () => {
        logger.fromContext().info("handled")
      })

      expect(out.records()[0]).toMatchObject({ requestID: "req-1", username: "ana" })
      expect(out.records()[0]).not.toHaveProperty("watcher")
    })

    it("fromContext() outside any context binds nothing", () => {
      const { logger, out } = setup()

      logger.fromContext().info("bare")

      expect(out.records()[0]).not.toHaveProperty("requestID")
    })
  })
})
