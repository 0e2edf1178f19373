import { basename } from "node:path"
import {
  convert,
  inputFormatFor,
  outputFormatFor,
  INPUT_FORMATS,
  MESSAGE_LEVELS,
  OUTPUT_FORMATS,
  type ConvertOptions,
  type InputFormat,
  type Logger,
  type MessageLevel,
  type OutputFormat,
} from "@docweave/markup-parser"
import { Command, CommanderError, Option } from "commander"

export interface CliIO {
  readFile(path: string): Promise<string>
  writeFile(path: string, content: string): Promise<void>
  writeStdout(text: string): void
  writeStderr(text: string): void
  logger?: Logger
}

interface CliOptions {
  from?: InputFormat
  to?: OutputFormat
  output?: string
  title?: string
  messageLevel?: MessageLevel
}

/** Sources are joined with a blank line between them. */
export async function readSources(files: readonly string[], io: CliIO): Promise<string> {
  const contents = await Promise.all(files.map((file) => io.readFile(file)))
  return contents.join("\n\n")
}

export function resolveCliOptions(files: readonly string[], options: CliOptions, logger?: Logger): ConvertOptions {
  const [first = ""] = files
  return {
    from: options.from ?? inputFormatFor(first),
    to: options.to ?? (options.output ? outputFormatFor(options.output) : "html"),
    title: options.title ?? basename(first),
    messageLevel: options.messageLevel,
    logger,
  }
}

export function createProgram(io: CliIO): Command {
  return new Command("docweave")
    .description("Convert Markdown and reStructuredText into HTML, DocBook or a structural dump")
    .version("0.1.0")
    .argument("<files...>", "input files, joined with a blank line")
    .addOption(new Option("--from <format>", "input format").choices(INPUT_FORMATS))
    .addOption(new Option("--to <format>", "output format").choices(OUTPUT_FORMATS))
    .option("-o, --output <file>", "output file, stdout when omitted")
    .option("--title <title>", "document title, the first file name when omitted")
    .addOption(new Option("--message-level <level>", "lowest level of messages shown in the output").choices(MESSAGE_LEVELS))
    .exitOverride()
    .configureOutput({
      writeOut: (text) => io.writeStdout(text),
      writeErr: (text) => io.writeStderr(text),
    })
    .action(async (files: string[], options: CliOptions) => {
      const source = await readSources(files, io)
      const output = convert(source, resolveCliOptions(files, options, io.logger))
      if (options.output) await io.writeFile(options.output, output)
      else io.writeStdout(output.endsWith("\n") ? output : `${output}\n`)
    })
}

/** Runs the command line and returns the exit code. */
export async function runCli(argv: readonly string[], io: CliIO): Promise<number> {
  try {
    await createProgram(io).parseAsync([...argv])
    return 0
  } catch (error: unknown) {
    if (error instanceof CommanderError) return error.exitCode
    const message = error instanceof Error ? error.message : String(error)
    io.writeStderr(`docweave: ${message}\n`)
    return 1
  }
}
