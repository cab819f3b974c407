import { errWithCause } from "pino-std-serializers"
import { FIELD, type Field } from "../ports/field"

/**
 * Constructors for typed fields.
 *
 * @example
 * ```ts
 * logger.info("request served", field.string("path", "/users"), field.int("status", 200))
 * ```
 */
export const field = {
  string: (key: string, value: string): Field => ({ [FIELD]: true, type: "string", key, value }),
  /** Truncates towards zero. */
  int: (key: string, value: number): Field => ({
    [FIELD]: true,
    type: "int",
    key,
    value: Math.trunc(value),
  }),
  float: (key: string, value: number): Field => ({ [FIELD]: true, type: "float", key, value }),
  bool: (key: string, value: boolean): Field => ({ [FIELD]: true, type: "bool", key, value }),
  error: (err: unknown, key = "error"): Field => ({
    [FIELD]: true,
    type: "error",
    key,
    value: err,
  }),
  object: (key: string, value: Readonly<Record<string, unknown>>): Field => ({
    [FIELD]: true,
    type: "object",
    key,
    value,
  }),
  any: (key: string, value: unknown): Field => ({ [FIELD]: true, type: "any", key, value }),
}

export function isField(value: unknown): value is Field {
  return typeof value === "object" && value !== null && FIELD in value
}

function encodeValue(f: Field): unknown {
  switch (f.type) {
    case "error":
    case "any":
      return f.value instanceof Error ? errWithCause(f.value) : f.value
    default:
      return f.value
  }
}

/**
 * Encodes fields into a record object; a later key wins over an earlier one.
 */
export function encodeFields(fields: readonly Field[]): Record<string, unknown> {
  const out: Record<string, unknown> = {}

  for (const f of fields) {
    out[f.key] = encodeValue(f)
  }

  return out
}
