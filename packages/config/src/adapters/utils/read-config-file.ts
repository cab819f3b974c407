import fs from "node:fs/promises"
import path from "node:path"

export type ConfigFileOptions = {
  /**
   * Path to the file, absolute or relative to `cwd`.
   *
   * @example "logging.json", ".env.production"
   */
  file: string

  /** When false, a missing file loads as an empty config. */
  required: boolean

  /** @default process.cwd() */
  cwd?: string
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT"
}

/**
 * Reads a config file and hands its text to `parse`. A missing optional file
 * loads as an empty object.
 */
export async function readConfigFile(
  opts: ConfigFileOptions,
  parse: (content: string) => Record<string, unknown>,
): Promise<Record<string, unknown>> {
  const filePath = path.resolve(opts.cwd ?? process.cwd(), opts.file)

  let content: string
  try {
    content = await fs.readFile(filePath, "utf-8")
  } catch (err) {
    if (!opts.required && isNotFound(err)) return {}
    throw err
  }

  return parse(content)
}
