import { parse } from "dotenv"
import type { ConfigSource } from "../../ports/source"
import { type ConfigFileOptions, readConfigFile } from "../utils/read-config-file"

export type DotenvSourceOptions = ConfigFileOptions

export class DotenvSource implements ConfigSource {
  readonly name: string

  constructor(private readonly opts: DotenvSourceOptions) {
    this.name = `dotenv:${opts.file}`
  }

  async load(): Promise<Record<string, unknown>> {
    return readConfigFile(this.opts, (content) => ({ ...parse(content) }))
  }
}
