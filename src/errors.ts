/**
 * Error taxonomy for the build pipeline.
 *
 * Errors carry a stable code, a one-line summary and a help line, and render
 * in a compiler-style diagnostic format:
 *
 *     error[B0002]: dependency `node-llama-cpp` is unavailable
 *      = attempted: prebuilt (failed), source (failed)
 *     help: check the installer output above, or install a C++ toolchain
 *
 * The pipeline is fail-fast: the first error halts the build. The only
 * sanctioned retry is the dependency resolver's strategy chain.
 */

import { styleText } from "node:util";

// =============================================================================
// Error Codes
// =============================================================================

export const ErrorCode = {
  PROFILE_UNSUPPORTED: "B0001",
  DEPENDENCY_UNAVAILABLE: "B0002",
  ENVIRONMENT_CREATION_FAILED: "B0003",
  MANIFEST_INCOMPLETE: "B0004",
  MANIFEST_CONFLICT: "B0005",
  PACKAGING_FAILED: "B0006",
  BUILD_LOCKED: "B0007",
  BUILD_INTERRUPTED: "B0008",
  CONFIGURATION: "B0009",
} as const;

export type ErrorCodeType = (typeof ErrorCode)[keyof typeof ErrorCode];

// =============================================================================
// Diagnostic Formatting
// =============================================================================

export interface DiagnosticOptions {
  /** Emit ANSI styling. */
  color?: boolean;
}

/**
 * Render an error as a diagnostic block. Non-pipeline errors fall back to
 * their message.
 */
export function formatDiagnostic(error: unknown, options: DiagnosticOptions = {}): string {
  const color = options.color ?? false;
  const paint = (format: Parameters<typeof styleText>[0], text: string): string =>
    color ? styleText(format, text) : text;

  if (!(error instanceof BundlesmithError)) {
    const message = error instanceof Error ? error.message : String(error);
    return `${paint("red", "error")}: ${message}`;
  }

  const lines = [`${paint("red", `error[${error.code}]`)}: ${paint("bold", error.summary)}`];
  for (const note of error.notes) {
    lines.push(`${paint("blue", " =")} ${note}`);
  }
  lines.push(`${paint("green", "help")}: ${error.help}`);
  return lines.join("\n");
}

// =============================================================================
// Base Error Class
// =============================================================================

export class BundlesmithError extends Error {
  readonly code: ErrorCodeType;
  readonly summary: string;
  readonly help: string;
  /** Extra context lines (which dependency, which strategy, which file). */
  readonly notes: readonly string[];

  constructor(options: {
    code: ErrorCodeType;
    summary: string;
    help: string;
    notes?: string[];
    cause?: unknown;
  }) {
    super(options.summary, { cause: options.cause });
    this.name = "BundlesmithError";
    this.code = options.code;
    this.summary = options.summary;
    this.help = options.help;
    this.notes = options.notes ?? [];
  }
}

// =============================================================================
// Profile
// =============================================================================

export class ProfileUnsupportedError extends BundlesmithError {
  readonly platform: string;
  readonly arch: string;

  constructor(options: { platform: string; arch: string; reason: string }) {
    super({
      code: ErrorCode.PROFILE_UNSUPPORTED,
      summary: `no packaging procedure for ${options.platform}-${options.arch}`,
      help: "build on a macOS, Windows or Linux host (x86_64 or arm64), or pass --os and --arch",
      notes: [options.reason],
    });
    this.name = "ProfileUnsupportedError";
    this.platform = options.platform;
    this.arch = options.arch;
  }
}

// =============================================================================
// Dependencies
// =============================================================================

/** Why a single acquisition strategy did not produce the dependency. */
export type AttemptFailure = "failed" | "network-unavailable" | "not-installed";

export interface StrategyAttempt {
  /** Strategy kind, e.g. `prebuilt`. */
  strategy: string;
  /** The command that was run. */
  command: string;
  failure: AttemptFailure;
  /** Last lines of the installer output, or the spawn error. */
  detail: string;
}

export class DependencyUnavailableError extends BundlesmithError {
  readonly dependency: string;
  readonly required: boolean;
  readonly attempts: readonly StrategyAttempt[];

  constructor(options: { dependency: string; required: boolean; attempts: StrategyAttempt[] }) {
    const offline = options.attempts.some((a) => a.failure === "network-unavailable");
    const attempted = options.attempts.map((a) => `${a.strategy} (${a.failure})`).join(", ");
    const notes = [`attempted: ${attempted || "no strategies"}`];
    for (const attempt of options.attempts) {
      if (attempt.detail) {
        notes.push(`${attempt.strategy}: ${attempt.detail}`);
      }
    }
    super({
      code: ErrorCode.DEPENDENCY_UNAVAILABLE,
      summary: `dependency \`${options.dependency}\` is unavailable`,
      help: offline
        ? "the package registry could not be reached; check your network connection or proxy settings (HTTPS_PROXY)"
        : "check the installer output above; compiling from source needs CMake and a C++ toolchain",
      notes,
    });
    this.name = "DependencyUnavailableError";
    this.dependency = options.dependency;
    this.required = options.required;
    this.attempts = options.attempts;
  }

  /** True when at least one attempt failed because the network was unreachable. */
  get networkUnavailable(): boolean {
    return this.attempts.some((a) => a.failure === "network-unavailable");
  }
}

// =============================================================================
// Environment
// =============================================================================

export class EnvironmentCreationFailedError extends BundlesmithError {
  readonly root: string;

  constructor(options: { root: string; reason: string; cause?: unknown }) {
    super({
      code: ErrorCode.ENVIRONMENT_CREATION_FAILED,
      summary: `could not create isolated environment at ${options.root}`,
      help: "make sure Node.js and npm are installed and the build directory is writable",
      notes: [options.reason],
      cause: options.cause,
    });
    this.name = "EnvironmentCreationFailedError";
    this.root = options.root;
  }
}

// =============================================================================
// Manifest
// =============================================================================

export interface MissingRequiredFile {
  /** Destination path inside the bundle. */
  dest: string;
  /** The exclusion rule that removed it, when it was collected. */
  removedBy?: string;
}

export class ManifestIncompleteError extends BundlesmithError {
  readonly missing: readonly MissingRequiredFile[];

  constructor(missing: MissingRequiredFile[]) {
    super({
      code: ErrorCode.MANIFEST_INCOMPLETE,
      summary: `${missing.length} required runtime file(s) missing from the bundle`,
      help: "narrow the exclusion rules in package.json \"bundlesmith.exclude\", or fix the required file list",
      notes: missing.map((m) =>
        m.removedBy ? `${m.dest} (removed by ${m.removedBy})` : `${m.dest} (not found)`,
      ),
    });
    this.name = "ManifestIncompleteError";
    this.missing = missing;
  }
}

export class ManifestConflictError extends BundlesmithError {
  readonly dest: string;

  constructor(options: { dest: string; sources: [string, string] }) {
    super({
      code: ErrorCode.MANIFEST_CONFLICT,
      summary: `two files map to the bundle path ${options.dest}`,
      help: "give the overlapping source trees distinct destinations",
      notes: options.sources.map((s) => `from ${s}`),
    });
    this.name = "ManifestConflictError";
    this.dest = options.dest;
  }
}

// =============================================================================
// Packaging
// =============================================================================

export class PackagingFailedError extends BundlesmithError {
  readonly expected: string;

  constructor(options: { expected: string; reason: string; cause?: unknown }) {
    super({
      code: ErrorCode.PACKAGING_FAILED,
      summary: `packaging did not produce ${options.expected}`,
      help: "rerun with --verbose to see the packaging tool output",
      notes: [options.reason],
      cause: options.cause,
    });
    this.name = "PackagingFailedError";
    this.expected = options.expected;
  }
}

// =============================================================================
// Orchestration
// =============================================================================

export class BuildLockedError extends BundlesmithError {
  readonly lockPath: string;

  constructor(options: { lockPath: string; ownerPid?: number }) {
    super({
      code: ErrorCode.BUILD_LOCKED,
      summary: "another build for this target is already running",
      help: `wait for it to finish, or delete ${options.lockPath} if no build is running`,
      notes: options.ownerPid !== undefined ? [`held by pid ${options.ownerPid}`] : [],
    });
    this.name = "BuildLockedError";
    this.lockPath = options.lockPath;
  }
}

export class BuildInterruptedError extends BundlesmithError {
  constructor(options: { command?: string } = {}) {
    super({
      code: ErrorCode.BUILD_INTERRUPTED,
      summary: "build interrupted",
      help: "rerun the build; the output directory holds no partial artifact",
      notes: options.command ? [`while running: ${options.command}`] : [],
    });
    this.name = "BuildInterruptedError";
  }
}

export class ConfigurationError extends BundlesmithError {
  constructor(options: { summary: string; help: string; notes?: string[] }) {
    super({ code: ErrorCode.CONFIGURATION, ...options });
    this.name = "ConfigurationError";
  }
}
