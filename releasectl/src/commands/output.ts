import type { LogFormat } from "../logging/logger.js";

export type FailureOutput = {
  /** Always present: fatal errors reach the error stream in every format. */
  stderr: string;
  stdout: string | null;
};

export function failureOutput(format: LogFormat, code: string, message: string): FailureOutput {
  return {
    stderr: `${code}: ${message}\n`,
    stdout: format === "jsonl" ? JSON.stringify({ level: "error", code, message }) + "\n" : null,
  };
}
