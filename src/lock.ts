/**
 * Per-target build lock.
 *
 * The lock is a file created with exclusive-create semantics and holding the
 * owner's pid. A second build of the same target fails immediately with
 * `BuildLocked`; a lock whose owner is no longer running is reclaimed.
 */

import { closeSync, mkdirSync, openSync, readFileSync, unlinkSync, writeSync } from "node:fs";
import { dirname } from "node:path";
import { BuildLockedError } from "./errors.js";

export interface BuildLock {
  readonly path: string;
  /** Remove the lock file. Safe to call more than once. */
  release(): void;
}

export interface LockOptions {
  /** Liveness check for the pid recorded in an existing lock. */
  isAlive?: (pid: number) => boolean;
}

interface LockContents {
  pid?: unknown;
}

/** The `code` of a Node.js system error, if there is one. */
export function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}

export function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    // EPERM: the process exists but belongs to someone else
    return errnoCode(error) === "EPERM";
  }
}

function readOwnerPid(lockPath: string): number | undefined {
  try {
    const contents: LockContents = JSON.parse(readFileSync(lockPath, "utf-8"));
    return typeof contents.pid === "number" ? contents.pid : undefined;
  } catch (error) {
    if (errnoCode(error) === "ENOENT") return undefined;
    // A half-written lock still belongs to a live writer
    return process.pid;
  }
}

/**
 * Take the lock at `lockPath`, recording `identity` next to the owner pid.
 *
 * @throws BuildLockedError when another live process holds it
 */
export function acquireBuildLock(
  lockPath: string,
  identity: Record<string, string>,
  options: LockOptions = {},
): BuildLock {
  const isAlive = options.isAlive ?? isProcessAlive;
  mkdirSync(dirname(lockPath), { recursive: true });

  // Two passes: the second follows reclaiming a stale lock
  for (let attempt = 0; attempt < 2; attempt++) {
    let fd: number;
    try {
      fd = openSync(lockPath, "wx");
    } catch (error) {
      if (errnoCode(error) !== "EEXIST") throw error;

      const ownerPid = readOwnerPid(lockPath);
      if (ownerPid !== undefined && isAlive(ownerPid)) {
        throw new BuildLockedError({ lockPath, ownerPid });
      }
      unlinkIfPresent(lockPath);
      continue;
    }

    try {
      writeSync(fd, JSON.stringify({ ...identity, pid: process.pid, started: new Date().toISOString() }, null, 2));
    } finally {
      closeSync(fd);
    }

    let released = false;
    return {
      path: lockPath,
      release() {
        if (released) return;
        released = true;
        unlinkIfPresent(lockPath);
      },
    };
  }

  // Someone else recreated the lock between reclaiming and retrying
  throw new BuildLockedError({ lockPath, ownerPid: readOwnerPid(lockPath) });
}

function unlinkIfPresent(path: string): void {
  try {
    unlinkSync(path);
  } catch (error) {
    if (errnoCode(error) !== "ENOENT") throw error;
  }
}
