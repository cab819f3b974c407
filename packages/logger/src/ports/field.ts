export const FIELD: unique symbol = Symbol.for("quill.log.field")

type FieldOf<T extends string, V> = {
  readonly [FIELD]: true
  readonly type: T
  readonly key: string
  readonly value: V
}

/**
 * A typed key/value pair attached to a record.
 *
 * Build fields with the `field.*` constructors; the brand lets the key/value
 * conversion recognise a field passed where a raw key was expected.
 */
export type Field =
  | FieldOf<"string", string>
  | FieldOf<"int", number>
  | FieldOf<"float", number>
  | FieldOf<"bool", boolean>
  | FieldOf<"error", unknown>
  | FieldOf<"object", Readonly<Record<string, unknown>>>
  | FieldOf<"any", unknown>

export type FieldType = Field["type"]
