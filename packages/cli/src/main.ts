#!/usr/bin/env tsx
import { readFile, writeFile } from "node:fs/promises"
import { createLogger, type LogLevel } from "@docweave/markup-parser"
import pino from "pino"
import { runCli } from "./cli"

const LOG_LEVELS: readonly LogLevel[] = ["silent", "trace", "debug", "info", "warn", "error", "fatal"]

function logLevel(value: string | undefined): LogLevel {
  return LOG_LEVELS.find((level) => level === value) ?? "warn"
}

const logger = createLogger({ level: logLevel(process.env.LOG_LEVEL), destination: pino.destination(2) })

runCli(process.argv, {
  readFile: (path) => readFile(path, "utf8"),
  writeFile: (path, content) => writeFile(path, content, "utf8"),
  writeStdout: (text) => process.stdout.write(text),
  writeStderr: (text) => process.stderr.write(text),
  logger,
}).then(
  (code) => {
    process.exitCode = code
  },
  (error: unknown) => {
    process.stderr.write(`${error instanceof Error ? error.message : String(error)}\n`)
    process.exitCode = 1
  },
)
