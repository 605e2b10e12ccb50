import { execFile } from "node:child_process";
import { promisify } from "node:util";

const execFileAsync = promisify(execFile);

export interface RunCommandOptions {
  cwd?: string;
  timeoutMs?: number;
  env?: Record<string, string>;
}

export interface RunCommandResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

interface ExecFailure {
  code?: unknown;
  killed?: boolean;
  stdout?: unknown;
  stderr?: unknown;
  message?: unknown;
}

function isExecFailure(err: unknown): err is ExecFailure {
  return typeof err === "object" && err !== null;
}

function asText(value: unknown): string {
  if (typeof value === "string") return value;
  if (Buffer.isBuffer(value)) return value.toString("utf8");
  return "";
}

export async function runCommand(command: string, args: string[], options?: RunCommandOptions): Promise<RunCommandResult> {
  try {
    const { stdout, stderr } = await execFileAsync(command, args, {
      cwd: options?.cwd,
      env: { ...process.env, ...options?.env },
      timeout: options?.timeoutMs,
      encoding: "utf8",
      maxBuffer: 16 * 1024 * 1024,
    });

    return { stdout, stderr, exitCode: 0 };
  } catch (err: unknown) {
    const failure: ExecFailure = isExecFailure(err) ? err : { message: String(err) };
    const stdout = asText(failure.stdout);
    const stderr = asText(failure.stderr) || asText(failure.message);
    // ENOENT and friends arrive as string codes
    const exitCode = typeof failure.code === "number" ? failure.code : 1;
    const reason = failure.killed ? "timed out" : `code=${typeof failure.code === "string" ? failure.code : exitCode}`;
    throw new Error(`Command failed (${command} ${args.join(" ")}): ${reason}\nSTDERR: ${stderr}\nSTDOUT: ${stdout}`, { cause: err });
  }
}
