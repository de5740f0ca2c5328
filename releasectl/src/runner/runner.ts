import { spawn } from "node:child_process";

export type RunResult = {
  exitCode: number | null;
  signal: NodeJS.Signals | null;
};

/**
 * The one capability the pipeline needs from the outside world: run a
 * program to completion and report how it exited. Rejects only when the
 * program could not be started at all.
 */
export interface Runner {
  execute(command: string, args: readonly string[]): Promise<RunResult>;
}

/** Spawns real processes with the operator's terminal attached (stdin included, for ssh prompts). */
export class ProcessRunner implements Runner {
  execute(command: string, args: readonly string[]): Promise<RunResult> {
    return new Promise((resolve, reject) => {
      const child = spawn(command, [...args], { stdio: "inherit", shell: false });
      child.once("error", reject);
      child.once("close", (exitCode, signal) => resolve({ exitCode, signal }));
    });
  }
}

export function describeCommand(command: string, args: readonly string[]): string {
  return [command, ...args].join(" ");
}

export function describeExit(result: RunResult): string {
  if (result.signal) return `terminated by signal ${result.signal}`;
  return `exited with code ${result.exitCode ?? "unknown"}`;
}

export function succeeded(result: RunResult): boolean {
  return result.exitCode === 0;
}
