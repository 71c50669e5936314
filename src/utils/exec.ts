import { execFile } from "node:child_process";

export class ExecError extends Error {
  constructor(
    message: string,
    public readonly exitCode: number | string | null,
    public readonly stderr: string,
  ) {
    super(message);
    this.name = "ExecError";
  }
}

export interface ExecResult {
  stdout: string;
  stderr: string;
}

export interface ExecOptions {
  cwd?: string;
  env?: Record<string, string>;
  /** Kill the child after this many milliseconds (0 = no limit). */
  timeoutMs?: number;
}

/**
 * Run a command and collect its output.
 *
 * git never prompts: credential and SSH passphrase prompts are disabled so an
 * unauthenticated remote fails instead of hanging.
 */
export function exec(cmd: string, args: string[], opts?: ExecOptions): Promise<ExecResult> {
  const env = {
    ...process.env,
    GIT_TERMINAL_PROMPT: "0",
    GIT_SSH_COMMAND: "ssh -o BatchMode=yes",
    ...opts?.env,
  };

  return new Promise((resolve, reject) => {
    execFile(
      cmd,
      args,
      { cwd: opts?.cwd, env, timeout: opts?.timeoutMs ?? 0, maxBuffer: 16 * 1024 * 1024 },
      (err, stdout, stderr) => {
        if (err) {
          const code = typeof err.code === "number" || typeof err.code === "string" ? err.code : null;
          const detail = err.killed ? `timed out after ${opts?.timeoutMs}ms` : stderr.trim() || err.message;
          reject(new ExecError(`${cmd} ${args.join(" ")} failed: ${detail}`, code, stderr));
          return;
        }
        resolve({ stdout, stderr });
      },
    );
  });
}
