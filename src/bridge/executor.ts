/**
 * executor.ts — PowerShell script executor
 *
 * Executes PowerShell scripts via powershell.exe -EncodedCommand
 * to communicate with the CAD application over COM.
 */

import { execFile } from "node:child_process";
import { promisify } from "node:util";

const exec = promisify(execFile);

export const DEFAULT_TIMEOUT = 30_000;

/** -EncodedCommand takes base64 of the UTF-16LE script text */
export function encodeCommand(script: string): string {
  return Buffer.from(script, "utf16le").toString("base64");
}

export interface ScriptOptions {
  /** Milliseconds before the PowerShell process is killed */
  timeout?: number;
  /** COM ProgID the script attaches to, named in timeout errors */
  progId?: string;
}

interface ExecFailure extends Error {
  stderr?: string;
  killed?: boolean;
}

function isExecFailure(err: unknown): err is ExecFailure {
  return err instanceof Error;
}

/**
 * Execute a PowerShell script and return stdout (typically a JSON string).
 * All scripts should end with ConvertTo-Json to return structured data.
 */
export async function runPowerShell(script: string, options: ScriptOptions = {}): Promise<string> {
  const timeout = options.timeout ?? DEFAULT_TIMEOUT;
  const args = [
    "-NoProfile",
    "-NonInteractive",
    "-ExecutionPolicy",
    "Bypass",
    "-EncodedCommand",
    encodeCommand(script),
  ];

  try {
    const { stdout } = await exec("powershell.exe", args, {
      timeout,
      maxBuffer: 16 * 1024 * 1024,
      windowsHide: true,
    });
    return stdout.trim();
  } catch (err: unknown) {
    if (!isExecFailure(err)) throw err;
    if (err.killed) {
      const target = options.progId ?? "the CAD application";
      throw new Error(
        `PowerShell script timed out (${timeout}ms) waiting for ${target}. It may be busy or showing a dialog.`,
      );
    }
    throw new Error(`PowerShell execution failed: ${err.stderr?.trim() || err.message}`);
  }
}

/**
 * Execute a PowerShell script and parse stdout as JSON.
 */
export async function runPowerShellJSON(script: string, options?: ScriptOptions): Promise<unknown> {
  const raw = await runPowerShell(script, options);
  try {
    return JSON.parse(raw);
  } catch {
    throw new Error(`PowerShell returned unparseable JSON: ${raw.slice(0, 200)}`);
  }
}

/**
 * Quote a string as a single-quoted PowerShell literal. PowerShell treats the
 * typographic single quotes as quote characters too, so those are doubled as well.
 */
export function quoteForPowerShell(s: string): string {
  return `'${s.replace(/['‘’‚‛]/g, (q) => q + q)}'`;
}
