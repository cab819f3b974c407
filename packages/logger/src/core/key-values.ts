import type { Field } from "../ports/field"
import { field, isField } from "./fields"

/**
 * Receives the logger's own complaints about a malformed key/value list.
 */
export type DiagnosticReporter = (message: string, detail: Field) => void

/**
 * Converts alternating keys and values into fields, then appends `additional`.
 *
 * Conversion is best-effort: the first malformed entry (a typed field in key
 * position, a key without a value, a non-string key) is reported and the rest
 * of the list is dropped. Pairs converted before it are kept.
 */
export function keyValuesToFields(
  keysAndValues: readonly unknown[],
  report: DiagnosticReporter,
  additional: readonly Field[] = [],
): Field[] {
  if (keysAndValues.length === 0) return [...additional]

  const fields: Field[] = []

  for (let i = 0; i < keysAndValues.length; i += 2) {
    const key = keysAndValues[i]

    if (isField(key)) {
      report("strongly-typed Field passed as a key-value pair", field.any("ignored field", key.key))
      break
    }

    if (i === keysAndValues.length - 1) {
      report(
        "odd number of arguments passed as key-value pairs for logging",
        field.any("ignored key", key),
      )
      break
    }

    if (typeof key !== "string") {
      report(
        "non-string key argument passed to logging, ignoring all later arguments",
        field.any("invalid key", key),
      )
      break
    }

    fields.push(field.any(key, keysAndValues[i + 1]))
  }

  return [...fields, ...additional]
}
