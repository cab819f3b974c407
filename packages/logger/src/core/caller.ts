import { basename, dirname, sep } from "node:path"
import { fileURLToPath } from "node:url"

// The package's src directory; frames below it (tests excepted) belong to the logger.
const srcDir = dirname(dirname(fileURLToPath(import.meta.url)))

const framePattern = /\(?((?:file:\/\/)?[^\s()]+):(\d+):\d+\)?$/

type Frame = { file: string; line: string }

function parseFrame(line: string): Frame | undefined {
  const match = framePattern.exec(line.trim())
  const location = match?.[1]
  const lineNumber = match?.[2]
  if (location === undefined || lineNumber === undefined) return undefined

  const file = location.startsWith("file://") ? fileURLToPath(location) : location

  return { file, line: lineNumber }
}

function isInternal(file: string): boolean {
  if (!file.startsWith(srcDir + sep)) return false

  return !file.includes(`${sep}__tests__${sep}`)
}

const stackDepth = 50

// Console and stream internals can sit between the caller and the logger.
function captureStack(): string | undefined {
  const limit = Error.stackTraceLimit
  Error.stackTraceLimit = stackDepth

  try {
    return new Error().stack
  } finally {
    Error.stackTraceLimit = limit
  }
}

function userFrames(stack: string | undefined): string[] {
  const lines = (stack ?? "").split("\n").slice(1)
  const firstOutside = lines.findIndex((line) => {
    const frame = parseFrame(line)

    return frame !== undefined && !frame.file.startsWith("node:") && !isInternal(frame.file)
  })

  return firstOutside === -1 ? [] : lines.slice(firstOutside)
}

/**
 * `dir/file.ts:line` of the code that called into the logger.
 */
export function callerLocation(): string | undefined {
  const [first] = userFrames(captureStack())
  if (first === undefined) return undefined

  const frame = parseFrame(first)
  if (!frame) return undefined

  return `${basename(dirname(frame.file))}/${basename(frame.file)}:${frame.line}`
}

/**
 * The stack from the caller outwards, one frame per line.
 */
export function callerStack(): string {
  return userFrames(captureStack())
    .map((line) => line.trim())
    .join("\n")
}
