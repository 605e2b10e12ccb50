import fs from "node:fs";
import { fileURLToPath } from "node:url";
import { Command, CommanderError } from "commander";
import { z } from "zod";
import { describeError, isUserError } from "../errors.js";
import { copyTranscript } from "../output/clipboard.js";
import { saveTranscript } from "../output/file.js";
import { shareTranscript } from "../output/paste.js";
import { runPipeline } from "../pipeline/index.js";
import type { ClipboardIntegration, HttpClient, PipelineEngines, PipelineOptions } from "../types.js";
import { setLogLevel } from "../utils/logger.js";

export const EXIT_SUCCESS = 0;
export const EXIT_USER_ERROR = 1;
export const EXIT_SYSTEM_ERROR = 2;
export const EXIT_SIGINT = 130;
export const EXIT_SIGTERM = 143;

const SIGNAL_EXIT_CODES: ReadonlyArray<readonly [NodeJS.Signals, number]> = [
  ["SIGINT", EXIT_SIGINT],
  ["SIGTERM", EXIT_SIGTERM],
];

export interface SignalSource {
  once(signal: NodeJS.Signals, listener: () => void): unknown;
}

/** Exit with 128 + the signal number on Ctrl-C or termination. */
export function installSignalHandlers(
  source: SignalSource = process,
  exit: (code: number) => void = (code) => process.exit(code)
): void {
  for (const [signal, code] of SIGNAL_EXIT_CODES) {
    source.once(signal, () => exit(code));
  }
}

const PackageSchema = z.object({ version: z.string() });

// src/cli and dist/cli both sit two levels below package.json
function readVersion(): string {
  const pkgPath = fileURLToPath(new URL("../../package.json", import.meta.url));
  return PackageSchema.parse(JSON.parse(fs.readFileSync(pkgPath, "utf-8"))).version;
}

const CliOptionsSchema = z.object({
  workDir: z.string().min(1).optional(),
  output: z.string().min(1).optional(),
  copy: z.boolean().default(false),
  share: z.boolean().default(false),
  json: z.boolean().default(false),
  verbose: z.boolean().default(false),
});

export type CliOptions = z.infer<typeof CliOptionsSchema>;

export interface CliDependencies {
  out?: (line: string) => void;
  err?: (line: string) => void;
  engines?: Partial<PipelineEngines>;
  clipboard?: ClipboardIntegration;
  http?: HttpClient;
  hostMarker?: string;
}

function writeLine(stream: NodeJS.WritableStream): (line: string) => void {
  return (line) => {
    stream.write(`${line}\n`);
  };
}

export function createProgram(deps: CliDependencies = {}): Command {
  const out = deps.out ?? writeLine(process.stdout);
  const program = new Command();

  program
    .name("clipscribe")
    .description("Fetch a short video and print the cleaned transcript of what is said in it")
    .version(readVersion(), "-v, --version")
    .argument("<url>", "video URL")
    .option("--work-dir <dir>", "directory for intermediate files")
    .option("--output <file>", "save the transcript to a file instead of printing it")
    .option("--copy", "copy the transcript to the clipboard")
    .option("--share", "upload the transcript to a paste service and print the URL")
    .option("--json", "print the transcript and the intermediate file paths as JSON")
    .option("--verbose", "debug logging on stderr")
    .showHelpAfterError("(use --help for available options)")
    .action(async (url: string, rawOptions: unknown) => {
      const options = CliOptionsSchema.parse(rawOptions);
      if (options.verbose) {
        setLogLevel("debug");
      }

      const pipelineOptions: PipelineOptions = {
        workDir: options.workDir,
        hostMarker: deps.hostMarker,
        engines: deps.engines,
      };

      if (options.output) {
        out(await saveTranscript(url, options.output, pipelineOptions));
      } else if (options.copy) {
        out(await copyTranscript(url, { ...pipelineOptions, clipboard: deps.clipboard }));
      } else if (options.share) {
        out(await shareTranscript(url, { ...pipelineOptions, http: deps.http }));
      } else if (options.json) {
        out(JSON.stringify(await runPipeline(url, pipelineOptions), null, 2));
      } else {
        const { text } = await runPipeline(url, pipelineOptions);
        out(text);
      }
    });

  return program;
}

/**
 * Parse `argv` (node-style: executable and script first) and run the
 * matching command. Resolves with the process exit code.
 */
export async function runCli(argv: string[], deps: CliDependencies = {}): Promise<number> {
  const out = deps.out ?? writeLine(process.stdout);
  const err = deps.err ?? writeLine(process.stderr);
  const program = createProgram({ ...deps, out });

  program.exitOverride();
  program.configureOutput({
    writeOut: (str) => out(str.trimEnd()),
    writeErr: (str) => err(str.trimEnd()),
  });

  try {
    await program.parseAsync(argv);
    return EXIT_SUCCESS;
  } catch (error) {
    if (error instanceof CommanderError) {
      // --help and --version end with exitCode 0
      return error.exitCode === 0 ? EXIT_SUCCESS : EXIT_USER_ERROR;
    }
    err(`error: ${describeError(error)}`);
    return isUserError(error) ? EXIT_USER_ERROR : EXIT_SYSTEM_ERROR;
  }
}
