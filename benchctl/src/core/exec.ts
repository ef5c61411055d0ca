import { execFile } from "node:child_process";
import { promisify } from "node:util";
import { ExternalCommandFailedError, ExternalToolMissingError } from "./errors.js";

const pExecFile = promisify(execFile);

export type ExecResult = { stdout: string; stderr: string };

/** Runs a command to completion, buffering its output. No timeout is applied. */
export type CommandRunner = (command: string, args: string[], opts?: { cwd?: string }) => Promise<ExecResult>;

type ExecFailure = Error & { code?: unknown; stderr?: unknown };

function isExecFailure(e: unknown): e is ExecFailure {
  return e instanceof Error;
}

/**
 * Default runner: execFile without a shell. A missing binary becomes
 * ExternalToolMissingError, a non-zero exit ExternalCommandFailedError.
 */
export const runCommand: CommandRunner = async (command, args, opts) => {
  try {
    const { stdout, stderr } = await pExecFile(command, args, {
      cwd: opts?.cwd,
      encoding: "utf8",
      maxBuffer: 64 * 1024 * 1024,
      shell: false,
    });
    return { stdout, stderr };
  } catch (e: unknown) {
    if (!isExecFailure(e)) throw e;
    if (e.code === "ENOENT") throw new ExternalToolMissingError(command);
    const stderr = typeof e.stderr === "string" ? e.stderr : e.message;
    const exitCode = typeof e.code === "number" ? e.code : null;
    throw new ExternalCommandFailedError([command, ...args], stderr, exitCode);
  }
};
