/**
 * Dependency resolution: install one dependency into an isolated npm prefix
 * by walking its acquisition strategies until one produces the package.
 *
 * Strategies fall through in order (prebuilt before source). Each attempt
 * is verified against the environment afterwards; an installer that exits
 * zero without leaving the package behind still counts as a failure.
 */

import { existsSync, readFileSync } from "node:fs";
import { join } from "node:path";
import {
  DEFAULT_ACCELERATION_FLAGS,
  DEFAULT_CONFLICTING_MARKERS,
  orderStrategies,
  type AcquisitionStrategy,
  type DependencySpec,
  type StrategyKind,
} from "./dependencies.js";
import { DependencyUnavailableError, type AttemptFailure, type StrategyAttempt } from "./errors.js";
import { formatCommand, npmCommand, tailOutput, type CommandResult, type CommandRunner } from "./process.js";
import { silentReporter, type Reporter } from "./reporter.js";
import { targetKey, type BuildTarget } from "./target.js";

// ============================================================================
// Types
// ============================================================================

export interface ResolverOptions {
  runner: CommandRunner;
  /** Environment the installer inherits; defaults to `process.env`. Never mutated. */
  baseEnv?: NodeJS.ProcessEnv;
  /** Host platform, for the npm executable name and search-path syntax. */
  platform?: NodeJS.Platform;
  signal?: AbortSignal;
  reporter?: Reporter;
  /** Stream installer output instead of capturing it. */
  verbose?: boolean;
}

/** One attempt's install command, fully prepared but not yet run. */
export interface PlannedAttempt {
  strategy: StrategyKind;
  command: string;
  args: string[];
  /** Compile step run after a successful install, with the same environment. */
  build?: { command: string; args: string[] };
  env: NodeJS.ProcessEnv;
  /** Packages the attempt must leave in `node_modules`. */
  expects: string[];
  /** Search-path entries dropped for a source build. */
  removedPathEntries: string[];
}

export interface InstalledDependency {
  name: string;
  /** Version from the installed package.json. */
  version: string;
  strategy: StrategyKind;
  /** Absolute path of `node_modules/<name>`. */
  directory: string;
  /** Acceleration-specific package installed alongside, if any. */
  variant?: string;
}

// ============================================================================
// Build environment sanitization
// ============================================================================

/** Activation variables a conda-style distribution leaves in the shell. */
const CONDA_ACTIVATION_VARS = ["CONDA_PREFIX", "CONDA_DEFAULT_ENV", "CONDA_PYTHON_EXE"];

export interface SanitizeOptions {
  markers?: readonly string[];
  platform?: NodeJS.Platform;
}

/**
 * Return a copy of `env` whose search path no longer mentions any of the
 * conflicting distribution markers, with their activation variables removed.
 */
export function sanitizeBuildEnv(
  env: NodeJS.ProcessEnv,
  options: SanitizeOptions = {},
): { env: NodeJS.ProcessEnv; removed: string[] } {
  const platform = options.platform ?? process.platform;
  const markers = (options.markers ?? DEFAULT_CONFLICTING_MARKERS).map((m) => m.toLowerCase());
  const separator = platform === "win32" ? ";" : ":";

  const sanitized: NodeJS.ProcessEnv = { ...env };
  for (const name of CONDA_ACTIVATION_VARS) {
    delete sanitized[name];
  }

  // Windows spells it Path, but any casing is honored there
  const pathKey = platform === "win32"
    ? Object.keys(sanitized).find((key) => key.toUpperCase() === "PATH")
    : "PATH";

  const removed: string[] = [];
  const current = pathKey ? sanitized[pathKey] : undefined;
  if (pathKey && current !== undefined) {
    const kept: string[] = [];
    for (const entry of current.split(separator)) {
      const lower = entry.toLowerCase();
      if (markers.some((marker) => lower.includes(marker))) {
        removed.push(entry);
      } else {
        kept.push(entry);
      }
    }
    sanitized[pathKey] = kept.join(separator);
  }

  return { env: sanitized, removed };
}

/**
 * `-DGGML_METAL=ON` with prefix `P_` becomes `P_GGML_METAL=ON`. Flags that
 * are not `-DNAME=VALUE` definitions have no variable form and are dropped.
 */
export function flagVariables(flags: readonly string[], prefix: string): Record<string, string> {
  const variables: Record<string, string> = {};
  for (const flag of flags) {
    const match = /^-D([A-Za-z0-9_]+)=(.*)$/.exec(flag);
    if (match) {
      variables[`${prefix}${match[1]}`] = match[2];
    }
  }
  return variables;
}

/** How an attempt is shown in plans and errors. */
export function describeAttempt(attempt: Pick<PlannedAttempt, "command" | "args" | "build">): string {
  const install = formatCommand(attempt.command, attempt.args);
  return attempt.build ? `${install} && ${formatCommand(attempt.build.command, attempt.build.args)}` : install;
}

// ============================================================================
// Failure classification
// ============================================================================

const NETWORK_ERROR_PATTERN = /\b(ENOTFOUND|EAI_AGAIN|ETIMEDOUT|ECONNREFUSED|ECONNRESET|ENETUNREACH)\b/;

/** Whether the installer failed because the registry could not be reached. */
export function isNetworkFailure(result: CommandResult): boolean {
  return NETWORK_ERROR_PATTERN.test(result.stderr) || NETWORK_ERROR_PATTERN.test(result.stdout);
}

// ============================================================================
// Resolver
// ============================================================================

export class DependencyResolver {
  private readonly runner: CommandRunner;
  private readonly baseEnv: NodeJS.ProcessEnv;
  private readonly platform: NodeJS.Platform;
  private readonly signal: AbortSignal | undefined;
  private readonly reporter: Reporter;
  private readonly verbose: boolean;

  constructor(options: ResolverOptions) {
    this.runner = options.runner;
    this.baseEnv = options.baseEnv ?? process.env;
    this.platform = options.platform ?? process.platform;
    this.signal = options.signal;
    this.reporter = options.reporter ?? silentReporter;
    this.verbose = options.verbose ?? false;
  }

  /**
   * The install commands `resolve` would run, in the order it would run them.
   */
  plan(spec: DependencySpec, target: BuildTarget, envRoot: string): PlannedAttempt[] {
    return orderStrategies(spec.acquisitionOrder).map((strategy) =>
      this.planAttempt(spec, strategy, target, envRoot),
    );
  }

  /**
   * Install `spec` into the npm prefix at `envRoot`.
   *
   * @throws DependencyUnavailableError when every strategy fails
   * @throws BuildInterruptedError when the signal aborts a running installer
   */
  async resolve(spec: DependencySpec, target: BuildTarget, envRoot: string): Promise<InstalledDependency> {
    const attempts: StrategyAttempt[] = [];

    for (const planned of this.plan(spec, target, envRoot)) {
      const display = describeAttempt(planned);
      this.reporter.debug(`${spec.name}: ${planned.strategy}: ${display}`);
      for (const entry of planned.removedPathEntries) {
        this.reporter.debug(`${spec.name}: dropped ${entry} from the build search path`);
      }

      const runOptions = { cwd: envRoot, env: planned.env, verbose: this.verbose, signal: this.signal };
      let result = await this.runner.run(planned.command, planned.args, runOptions);
      if (result.exitCode === 0 && planned.build) {
        result = await this.runner.run(planned.build.command, planned.build.args, runOptions);
      }

      let failure: AttemptFailure | null = null;
      if (result.exitCode !== 0) {
        failure = isNetworkFailure(result) ? "network-unavailable" : "failed";
      } else if (!planned.expects.every((name) => isInstalled(envRoot, name))) {
        failure = "not-installed";
      }

      if (failure === null) {
        const variant = planned.expects.find((name) => name !== spec.name);
        return {
          name: spec.name,
          version: installedVersion(envRoot, spec.name),
          strategy: planned.strategy,
          directory: packageDir(envRoot, spec.name),
          ...(variant ? { variant } : {}),
        };
      }

      const detail = failure === "not-installed"
        ? `installer exited 0 but ${planned.expects.join(", ")} is missing from the environment`
        : tailOutput(result);
      attempts.push({ strategy: planned.strategy, command: display, failure, detail });
      this.reporter.debug(`${spec.name}: ${planned.strategy} ${failure}`);
    }

    throw new DependencyUnavailableError({
      dependency: spec.name,
      required: spec.required,
      attempts,
    });
  }

  private planAttempt(
    spec: DependencySpec,
    strategy: AcquisitionStrategy,
    target: BuildTarget,
    envRoot: string,
  ): PlannedAttempt {
    const command = npmCommand(this.platform);
    const args = ["install", "--prefix", envRoot, "--no-audit", "--no-fund"];
    const requested = spec.version ? `${spec.name}@${spec.version}` : spec.name;

    switch (strategy.strategy) {
      case "prebuilt": {
        const { registry, variants } = strategy.parameters;
        if (registry) {
          args.push("--registry", registry);
        }
        const variant = variants?.[targetKey(target)];
        args.push(requested);
        if (variant) {
          args.push(variant);
        }
        return {
          strategy: "prebuilt",
          command,
          args,
          env: { ...this.baseEnv },
          expects: variant ? [spec.name, variant] : [spec.name],
          removedPathEntries: [],
        };
      }

      case "source": {
        const { flagsEnv, flagEnvPrefix, accelerationFlags, conflictingMarkers, build } = strategy.parameters;
        const flags = accelerationFlags?.[target.acceleration] ?? DEFAULT_ACCELERATION_FLAGS[target.acceleration];
        const { env, removed } = sanitizeBuildEnv(this.baseEnv, {
          markers: conflictingMarkers,
          platform: this.platform,
        });
        if (flagEnvPrefix) {
          Object.assign(env, flagVariables(flags, flagEnvPrefix));
        }
        if (flagsEnv || !flagEnvPrefix) {
          env[flagsEnv ?? "CMAKE_ARGS"] = flags.join(" ");
        }
        Object.assign(env, build?.env);

        if (!build) {
          args.push("--build-from-source", requested);
          return {
            strategy: "source",
            command,
            args,
            env,
            expects: [spec.name],
            removedPathEntries: removed,
          };
        }

        args.push(requested);
        return {
          strategy: "source",
          command,
          args,
          build: {
            command,
            // --no: never fetch the binary from the registry if the install left it out
            args: ["exec", "--no", "--", ...build.command, ...(build.accelerationArgs?.[target.acceleration] ?? [])],
          },
          env,
          expects: [spec.name],
          removedPathEntries: removed,
        };
      }

      case "local":
        // Copy rather than symlink so the package survives into the bundle
        args.push("--install-links", strategy.parameters.path);
        return {
          strategy: "local",
          command,
          args,
          env: { ...this.baseEnv },
          expects: [spec.name],
          removedPathEntries: [],
        };
    }
  }
}

// ============================================================================
// Environment inspection
// ============================================================================

export function packageDir(envRoot: string, name: string): string {
  return join(envRoot, "node_modules", ...name.split("/"));
}

function isInstalled(envRoot: string, name: string): boolean {
  return existsSync(join(packageDir(envRoot, name), "package.json"));
}

function installedVersion(envRoot: string, name: string): string {
  try {
    const parsed: unknown = JSON.parse(readFileSync(join(packageDir(envRoot, name), "package.json"), "utf-8"));
    if (typeof parsed === "object" && parsed !== null && "version" in parsed && typeof parsed.version === "string") {
      return parsed.version;
    }
  } catch {
    // Unreadable manifest: the package is present, its version is not known
  }
  return "0.0.0";
}
