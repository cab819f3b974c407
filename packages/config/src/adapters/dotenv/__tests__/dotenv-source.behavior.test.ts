import fs from "node:fs/promises"
import os from "node:os"
import path from "node:path"
import { DotenvSource } from "../dotenv-source"

describe("DotenvSource behavior", () => {
  let cwd: string

  beforeEach(async () => {
    cwd = await fs.mkdtemp(path.join(os.tmpdir(), "quill-dotenv-"))
  })

  afterEach(async () => {
    await fs.rm(cwd, { recursive: true, force: true })
  })

  it("parses assignments, quotes and comments", async () => {
    await fs.writeFile(
      path.join(cwd, ".env"),
      "# logging\nLOG_LEVEL=debug\nLOG_NAME='api server'\nLOG_OUTPUT_PATHS=\"stdout,app.log\"\n",
    )

    const result = await new DotenvSource({ file: ".env", required: true, cwd }).load()

    expect(result).toEqual({
      LOG_LEVEL: "debug",
      LOG_NAME: "api server",
      LOG_OUTPUT_PATHS: "stdout,app.log",
    })
  })

  it("treats a missing optional file as empty", async () => {
    const source = new DotenvSource({ file: ".env.local", required: false, cwd })

    await expect(source.load()).resolves.toEqual({})
  })

  it("rejects a missing required file", async () => {
    const source = new DotenvSource({ file: ".env.local", required: true, cwd })

    await expect(source.load()).rejects.toThrow()
  })
})
