/**
 * `bundlesmith build`: run the build state machine for one target and report
 * progress as `[n/6]` steps.
 */

import { resolve } from "node:path";
import { loadProjectConfig, type ProjectConfig } from "../config.js";
import { BuildInterruptedError, formatDiagnostic } from "../errors.js";
import { describeRule } from "../manifest.js";
import { BUILD_STEPS, BuildOrchestrator, type BuildPlan } from "../orchestrator.js";
import { PkgCompiler, type ExecutableCompiler } from "../packager/index.js";
import { ProcessRunner, type CommandRunner } from "../process.js";
import type { HostInfo } from "../profile.js";
import type { Reporter } from "../reporter.js";
import { describeAttempt } from "../resolver.js";
import {
  describeTarget,
  isAccelerationRequest,
  isCpuArch,
  isOsFamily,
  targetKey,
  type AccelerationRequest,
  type CpuArch,
  type OsFamily,
} from "../target.js";
import { fmtError, takeValue } from "./commands.js";
import { bold, cyan, cyanBold, dim, greenBold, whiteBold, yellow } from "./fmt.js";
import { createStepProgress, STEP_LABELS, stepLine, type ProgressOutput, type StepProgress } from "./progress.js";

export { STEP_LABELS, stepLine } from "./progress.js";

// ============================================================================
// Options
// ============================================================================

export interface TargetFlags {
  os?: OsFamily;
  arch?: CpuArch;
  gpu?: AccelerationRequest;
}

export interface BuildCommandOptions extends TargetFlags {
  output?: string;
  project?: string;
  /** `false` with --no-dmg; otherwise package.json decides. */
  dmg?: boolean;
  /** `true` with --shortcut; otherwise package.json decides. */
  shortcut?: boolean;
  keepEnv: boolean;
  dryRun: boolean;
  quiet: boolean;
  verbose: boolean;
}

/**
 * Consume a target-selection flag at `args[i]`. Returns the number of
 * arguments used, or 0 when `args[i]` is not a target flag.
 */
export function parseTargetFlag(args: string[], i: number, flags: TargetFlags): number {
  const arg = args[i];
  if (arg === "--os") {
    const value = takeValue(args, i, arg);
    if (value !== "host" && !isOsFamily(value)) {
      throw new Error(`Invalid --os '${value}'. Valid values: macos, windows, linux, host`);
    }
    flags.os = value === "host" ? undefined : value;
    return 2;
  }
  if (arg === "--arch") {
    const value = takeValue(args, i, arg);
    if (value !== "host" && !isCpuArch(value)) {
      throw new Error(`Invalid --arch '${value}'. Valid values: x86_64, arm64, host`);
    }
    flags.arch = value === "host" ? undefined : value;
    return 2;
  }
  if (arg === "--gpu") {
    const value = takeValue(args, i, arg);
    if (!isAccelerationRequest(value)) {
      throw new Error(`Invalid --gpu '${value}'. Valid values: auto, none, metal, cuda`);
    }
    flags.gpu = value;
    return 2;
  }
  return 0;
}

/**
 * Parse and validate build options from command-line arguments.
 */
export function parseBuildArgs(args: string[]): BuildCommandOptions {
  const options: BuildCommandOptions = {
    keepEnv: false,
    dryRun: false,
    quiet: false,
    verbose: false,
  };

  let i = 0;
  while (i < args.length) {
    const used = parseTargetFlag(args, i, options);
    if (used > 0) {
      i += used;
      continue;
    }

    const arg = args[i];
    if (arg === "-o" || arg === "--output") {
      options.output = takeValue(args, i, "--output");
      i++;
    } else if (arg === "--project") {
      options.project = takeValue(args, i, arg);
      i++;
    } else if (arg === "--no-dmg") {
      options.dmg = false;
    } else if (arg === "--shortcut") {
      options.shortcut = true;
    } else if (arg === "--keep-env") {
      options.keepEnv = true;
    } else if (arg === "--dry-run" || arg === "-n") {
      options.dryRun = true;
    } else if (arg === "--quiet" || arg === "-q") {
      options.quiet = true;
    } else if (arg === "--verbose" || arg === "-v") {
      options.verbose = true;
    } else if (arg.startsWith("-")) {
      throw new Error(`Unknown option: ${arg}`);
    } else {
      throw new Error(`Unexpected argument: ${arg}`);
    }
    i++;
  }

  if (options.quiet && options.verbose) {
    throw new Error("--quiet and --verbose cannot be used together");
  }
  return options;
}

/**
 * CLI options take precedence over package.json configuration.
 */
export function applyCliOverrides(
  config: ProjectConfig,
  options: BuildCommandOptions,
  cwd: string = process.cwd(),
): ProjectConfig {
  return {
    ...config,
    dmg: options.dmg ?? config.dmg,
    desktopShortcut: options.shortcut ?? config.desktopShortcut,
    outputDir: options.output ? resolve(cwd, options.output) : config.outputDir,
  };
}

// ============================================================================
// Terminal output
// ============================================================================

function formatSize(bytes: number): string {
  if (bytes >= 1024 * 1024) return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
  if (bytes >= 1024) return `${(bytes / 1024).toFixed(1)} KB`;
  return `${bytes} B`;
}

function createTerminalReporter(options: BuildCommandOptions, progress: StepProgress): Reporter {
  const write = (line: string) => progress.print(line);
  return {
    info(message) {
      if (!options.quiet) write(`  ${dim(message)}`);
    },
    warn(message) {
      if (!options.quiet) write(`  ${yellow("warning:")} ${message}`);
    },
    debug(message) {
      if (options.verbose) write(`  ${dim(message)}`);
    },
  };
}

function printPlan(plan: BuildPlan, config: ProjectConfig): void {
  console.log(bold("Dry run mode - no files will be created\n"));

  console.log(bold("Target:"));
  console.log(`  ${describeTarget(plan.target)} ${dim(`(${targetKey(plan.target)})`)}`);
  for (const warning of plan.warnings) {
    console.log(`  ${yellow("warning:")} ${warning}`);
  }
  console.log();

  console.log(bold("Application:"));
  console.log(`  ${config.productName} ${config.version} ${dim(`(${config.bundleIdentifier})`)}`);
  console.log(`  entry: ${config.entry}`);
  for (const tree of config.sourceTrees) {
    console.log(`  source tree: ${tree.path}${tree.dest ? ` → app/${tree.dest}` : ""}`);
  }
  console.log();

  console.log(bold("Isolated environment:"));
  console.log(`  ${plan.environmentRoot}\n`);

  console.log(bold("Dependencies:"));
  for (const install of plan.installs) {
    console.log(`  ${install.dependency}${install.required ? "" : dim(" (optional)")}`);
    install.attempts.forEach((attempt, index) => {
      console.log(`    ${index + 1}. ${attempt.strategy}: ${describeAttempt(attempt)}`);
      for (const entry of attempt.removedPathEntries) {
        console.log(`       ${dim(`drops ${entry} from PATH`)}`);
      }
    });
  }
  console.log();

  console.log(bold("Exclusions:"));
  for (const rule of config.exclusions) {
    console.log(`  ${describeRule(rule)}`);
  }
  console.log();

  console.log(bold("Artifact:"));
  console.log(`  ${plan.artifact.kind} → ${plan.artifact.path}\n`);

  console.log(bold("Build steps:"));
  for (const step of BUILD_STEPS) {
    console.log(`  ${stepLine(step)}`);
  }
  console.log();

  console.log(dim("Run without --dry-run to build."));
}

// ============================================================================
// Command
// ============================================================================

export interface BuildDependencies {
  runner?: CommandRunner;
  compiler?: ExecutableCompiler;
  host?: HostInfo;
  cwd?: string;
  /** Where step progress is written; stderr by default. */
  progressOutput?: ProgressOutput;
}

/**
 * Run `bundlesmith build`. Returns the process exit code.
 *
 * @throws ConfigurationError when the project configuration is invalid
 */
export async function runBuild(options: BuildCommandOptions, dependencies: BuildDependencies = {}): Promise<number> {
  const cwd = dependencies.cwd ?? process.cwd();
  const projectDir = resolve(cwd, options.project ?? ".");
  const config = applyCliOverrides(loadProjectConfig(projectDir), options, cwd);

  const controller = new AbortController();
  const interrupt = () => controller.abort();
  process.once("SIGINT", interrupt);
  process.once("SIGTERM", interrupt);

  const progress = createStepProgress({
    quiet: options.quiet,
    ...(dependencies.progressOutput ? { output: dependencies.progressOutput } : {}),
  });
  const reporter = createTerminalReporter(options, progress);

  const orchestrator = new BuildOrchestrator({
    config,
    runner: dependencies.runner ?? new ProcessRunner(),
    compiler: dependencies.compiler ?? new PkgCompiler(),
    profile: {
      ...(dependencies.host ? { host: dependencies.host } : {}),
      ...(options.os ? { os: options.os } : {}),
      ...(options.arch ? { arch: options.arch } : {}),
      ...(options.gpu ? { gpu: options.gpu } : {}),
    },
    keepEnvironment: options.keepEnv,
    signal: controller.signal,
    reporter,
    verbose: options.verbose,
    onTransition: (transition) => progress.advance(transition),
  });

  try {
    if (options.dryRun) {
      printPlan(await orchestrator.plan(), config);
      return 0;
    }

    progress.begin();
    const result = await orchestrator.run();

    if (result.status === "failed") {
      console.error(fmtError(`build failed while entering ${result.step} (${STEP_LABELS[result.step].toLowerCase()})`));
      console.error(formatDiagnostic(result.error, { color: process.stderr.isTTY === true }));
      if (process.env.DEBUG && result.error instanceof Error && result.error.stack) {
        console.error(result.error.stack);
      }
      return result.error instanceof BuildInterruptedError ? 130 : 1;
    }

    const { artifact } = result;
    if (options.quiet) {
      console.log(artifact.path);
    } else {
      console.log(
        `\n${greenBold("✔ Built")} ${whiteBold(artifact.kind)} ${cyan(artifact.path)} ${dim(`(${formatSize(artifact.sizeBytes)})`)}`,
      );
      if (options.keepEnv) {
        console.log(dim(`  environment kept at ${resolve(config.buildDir, "env", targetKey(result.target))}`));
      }
    }
    return 0;
  } finally {
    progress.stop();
    process.off("SIGINT", interrupt);
    process.off("SIGTERM", interrupt);
  }
}

/**
 * Show help for the build command.
 */
export function showBuildHelp(): void {
  console.log(`
${cyanBold("bundlesmith build")} - ${whiteBold("Build the installable artifact for one target")}

${greenBold("Usage:")}
  ${cyanBold("bundlesmith build")} ${cyan("[options]")}

${greenBold("Options:")}
  ${cyan("--os")} ${dim("<os>")}              Target OS: macos, windows, linux ${dim("(default: host)")}
  ${cyan("--arch")} ${dim("<arch>")}          Target architecture: x86_64, arm64 ${dim("(default: host)")}
  ${cyan("--gpu")} ${dim("<accel>")}          Acceleration: auto, none, metal, cuda ${dim("(default: auto)")}
  ${cyan("-o, --output")} ${dim("<dir>")}     Output directory ${dim("(default: ./dist)")}
  ${cyan("--project")} ${dim("<dir>")}        Application directory ${dim("(default: .)")}
  ${cyan("--no-dmg")}               macOS: stop at the .app bundle
  ${cyan("--shortcut")}             Windows: create a desktop shortcut
  ${cyan("--keep-env")}             Keep the isolated environment after the build
  ${cyan("-n, --dry-run")}          Show what would be built without building
  ${cyan("-q, --quiet")}            Print only the artifact path and errors ${dim("(for CI)")}
  ${cyan("-v, --verbose")}          Show installer and packaging tool output
  ${cyan("-h, --help")}             Show this help message

${greenBold("Artifacts:")}
  ${cyan("macos")}                  <Name>.app, or <Name>-<version>-<arch>.dmg
  ${cyan("windows")}                <Name>.exe
  ${cyan("linux")}                  <Name>-<version>-<arch>.AppImage

${greenBold("Examples:")}
  ${cyanBold("bundlesmith build")}                            Build for this machine
  ${cyanBold("bundlesmith build")} ${cyan("--gpu none")}                 CPU-only build
  ${cyanBold("bundlesmith build")} ${cyan("--os linux --arch arm64")}    Cross-target build
  ${cyanBold("bundlesmith build")} ${cyan("--dry-run")}                  Preview the build plan

${greenBold("Configuration via package.json:")}
  Add a "bundlesmith" key to your package.json:

    {
      "productName": "LocalLLM Studio",
      "main": "server/main.js",
      "bundlesmith": {
        "sourceTrees": ["server", { "path": "ui/dist", "dest": "ui" }],
        "exclude": ["substring:benchmark"],
        "dmg": true
      }
    }

  CLI options override package.json settings.
`.trim() + "\n");
}
