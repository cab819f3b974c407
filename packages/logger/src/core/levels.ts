import { type Severity, severityNames, Verbosity } from "../ports/log-level"

function isSeverity(value: string): value is Severity {
  return (severityNames as readonly string[]).includes(value)
}

/**
 * Parses a level name case-insensitively. The empty string is `info`.
 */
export function parseSeverity(text: string): Severity | undefined {
  const lowered = text.toLowerCase()

  if (lowered === "") return "info"

  return isSeverity(lowered) ? lowered : undefined
}

/**
 * The severity a verbosity number is emitted at, clamped to the known range.
 */
export function severityForVerbosity(level: number): Severity {
  let match: Severity = "debug"

  for (const name of severityNames) {
    if (Verbosity[name] <= level) match = name
  }

  return match
}

export function isAtLeast(severity: Severity, threshold: Severity): boolean {
  return Verbosity[severity] >= Verbosity[threshold]
}
