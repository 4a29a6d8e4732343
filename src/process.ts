/**
 * The single seam through which the pipeline runs external tools (npm,
 * codesign, hdiutil, appimagetool, PowerShell).
 *
 * Every stage receives a `CommandRunner` instead of spawning directly, so an
 * interrupt can be forwarded to whichever child is running and tests can
 * substitute an in-process fake.
 */

import { spawn } from "node:child_process";
import { BuildInterruptedError } from "./errors.js";

// ============================================================================
// Types
// ============================================================================

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

export interface RunOptions {
  cwd?: string;
  /** Complete environment for the child; defaults to `process.env`. */
  env?: NodeJS.ProcessEnv;
  /** Stream output to the terminal instead of capturing it. */
  verbose?: boolean;
  /** Aborting kills the child and rejects with `BuildInterruptedError`. */
  signal?: AbortSignal;
}

export interface CommandRunner {
  run(command: string, args: string[], options?: RunOptions): Promise<CommandResult>;
}

// ============================================================================
// Implementation
// ============================================================================

/**
 * Spawn a subprocess and wait for completion.
 *
 * Spawn failures (missing executable, permissions) resolve with a non-zero
 * exit code and the error message as stderr; only an abort rejects.
 */
export function spawnAsync(
  command: string,
  args: string[],
  options: RunOptions = {},
): Promise<CommandResult> {
  const display = formatCommand(command, args);

  return new Promise((resolve, reject) => {
    if (options.signal?.aborted) {
      reject(new BuildInterruptedError({ command: display }));
      return;
    }

    const proc = spawn(command, args, {
      cwd: options.cwd,
      env: options.env ?? process.env,
      stdio: options.verbose ? "inherit" : "pipe",
      signal: options.signal,
      // Node refuses to spawn .cmd shims without a shell on Windows
      shell: process.platform === "win32" && command.endsWith(".cmd"),
    });

    let stdout = "";
    let stderr = "";

    if (!options.verbose) {
      proc.stdout?.on("data", (data: Buffer) => {
        stdout += data.toString();
      });
      proc.stderr?.on("data", (data: Buffer) => {
        stderr += data.toString();
      });
    }

    proc.on("close", (code) => {
      if (options.signal?.aborted) {
        reject(new BuildInterruptedError({ command: display }));
        return;
      }
      resolve({ exitCode: code ?? 1, stdout, stderr });
    });

    proc.on("error", (error) => {
      if (options.signal?.aborted) {
        reject(new BuildInterruptedError({ command: display }));
        return;
      }
      resolve({ exitCode: 1, stdout, stderr: error.message });
    });
  });
}

export class ProcessRunner implements CommandRunner {
  run(command: string, args: string[], options?: RunOptions): Promise<CommandResult> {
    return spawnAsync(command, args, options);
  }
}

// ============================================================================
// Helpers
// ============================================================================

/** The npm executable name on the given host platform. */
export function npmCommand(platform: NodeJS.Platform = process.platform): string {
  return platform === "win32" ? "npm.cmd" : "npm";
}

/** Render a command line for logs and error notes. */
export function formatCommand(command: string, args: string[]): string {
  return [command, ...args].map((part) => (/\s/.test(part) ? JSON.stringify(part) : part)).join(" ");
}

/**
 * Last non-empty lines of a command's output, for error notes.
 */
export function tailOutput(result: CommandResult, lineCount = 5): string {
  const text = result.stderr.trim() || result.stdout.trim();
  return text.split("\n").filter((line) => line.trim() !== "").slice(-lineCount).join("\n");
}
