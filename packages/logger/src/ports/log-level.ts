export const severityNames = [
  "debug",
  "info",
  "warn",
  "error",
  "dpanic",
  "panic",
  "fatal",
] as const

/**
 * Ordered record severity: `debug < info < warn < error < dpanic < panic < fatal`.
 *
 * `dpanic` marks programmer errors; the logger reports its own misuse at this
 * level. `panic` and `fatal` records escalate after they are written.
 */
export type Severity = (typeof severityNames)[number]

/** Severities with a method family on the facade. */
export type CallSeverity = Exclude<Severity, "dpanic">

export type EscalatingSeverity = "panic" | "fatal"

/**
 * Verbosity number of each severity, as accepted by `v(n)`.
 * Higher is more severe; `info` is 0.
 */
export const Verbosity = {
  debug: -1,
  info: 0,
  warn: 1,
  error: 2,
  dpanic: 3,
  panic: 4,
  fatal: 5,
} as const satisfies Record<Severity, number>
