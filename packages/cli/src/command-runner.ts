import { spawn } from "node:child_process";
import { TransportError } from "./errors.js";
import { debug, redactArgs } from "./log.js";

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

export interface RunOptions {
  cwd?: string;
  /** Stream the child's output to this process instead of capturing it. */
  inherit?: boolean;
}

export interface CommandRunner {
  run(command: string, args: string[], options?: RunOptions): Promise<CommandResult>;
}

export class SpawnCommandRunner implements CommandRunner {
  run(command: string, args: string[], options: RunOptions = {}): Promise<CommandResult> {
    debug(`$ ${[command, ...redactArgs(args)].join(" ")}${options.cwd ? ` (in ${options.cwd})` : ""}`);
    return new Promise((resolve, reject) => {
      const proc = spawn(command, args, {
        cwd: options.cwd,
        stdio: options.inherit ? "inherit" : "pipe"
      });
      let stdout = "";
      let stderr = "";
      proc.stdout?.on("data", (chunk) => {
        stdout += String(chunk);
      });
      proc.stderr?.on("data", (chunk) => {
        stderr += String(chunk);
      });
      proc.on("error", (error) => {
        reject(
          new TransportError(`Unable to start ${command}: ${error.message}`, {
            command
          })
        );
      });
      proc.on("close", (code) => {
        resolve({ exitCode: code ?? 1, stdout, stderr });
      });
    });
  }
}

/** Runs a command and returns its stdout, raising `TransportError` on a non-zero exit. */
export async function runChecked(
  runner: CommandRunner,
  command: string,
  args: string[],
  options?: RunOptions
) {
  const result = await runner.run(command, args, options);
  if (result.exitCode !== 0) {
    const output = `${result.stdout}${result.stderr}`.trim();
    throw new TransportError(
      `Command "${[command, ...redactArgs(args)].join(" ")}" exited with code ${result.exitCode}${
        output ? `: ${output}` : ""
      }`,
      { command, exit_code: result.exitCode }
    );
  }
  return result.stdout;
}
