import { PanicError } from "../../../core/errors"
import { disabledInfoLogger, NullLogger } from "../null-logger"

describe("NullLogger behavior", () => {
  it("reports itself disabled and derives itself", () => {
    const logger = new NullLogger(vi.fn())

    expect(logger.enabled()).toBe(false)
    expect(logger.withValues("a", 1)).toBe(logger)
    expect(logger.withName("api")).toBe(logger)
    expect(logger.fromContext()).toBe(logger)
  })

  it("hands out the shared disabled info logger", () => {
    const logger = new NullLogger(vi.fn())

    expect(logger.v(0)).toBe(disabledInfoLogger)
    expect(disabledInfoLogger.enabled()).toBe(false)
  })

  it("still escalates panic and fatal", () => {
    const exit = vi.fn()
    const logger = new NullLogger(exit)

    expect(() => logger.panicw("boom", "k", "v")).toThrow(PanicError)

    logger.fatal("stop")

    expect(exit).toHaveBeenCalledWith(1)
  })

  it("formats the panicf message", () => {
    const logger = new NullLogger(vi.fn())

    expect(() => logger.panicf("id=%d", 7)).toThrow(new PanicError("id=7"))
  })

  it("counts bytes written", async () => {
    const logger = new NullLogger(vi.fn())

    expect(logger.write("hé")).toBe(3)
    await expect(logger.flush()).resolves.toBeUndefined()
  })
})
