/**
 * The build state machine.
 *
 *     Init → ProfileResolved → EnvironmentReady → DependenciesInstalled
 *          → ManifestBuilt → Packaged → Done
 *
 * Any failure ends the run in `Failed(step, error)`, where `step` is the state
 * that was being entered. No state is skipped and nothing is retried here;
 * the only fallback chain lives in the dependency resolver.
 */

import { mkdirSync, rmSync } from "node:fs";
import { join } from "node:path";
import type { ProjectConfig } from "./config.js";
import { validateDependencyTable } from "./dependencies.js";
import { IsolatedEnvironmentManager } from "./environment.js";
import { BuildInterruptedError, DependencyUnavailableError } from "./errors.js";
import { acquireBuildLock, type BuildLock, type LockOptions } from "./lock.js";
import { BundleManifestBuilder, type BundleManifest } from "./manifest.js";
import {
  DEFAULT_PACKAGERS,
  selectPackager,
  type AppMetadata,
  type ArtifactKind,
  type ExecutableCompiler,
  type PackageArtifact,
  type PackagerContext,
  type PackagerRegistry,
} from "./packager/index.js";
import type { CommandRunner } from "./process.js";
import {
  createCudaProbe,
  requireSupportedTarget,
  resolvePlatformProfile,
  type ProfileOptions,
} from "./profile.js";
import { silentReporter, type Reporter } from "./reporter.js";
import { DependencyResolver, type PlannedAttempt } from "./resolver.js";
import { targetKey, type BuildTarget } from "./target.js";

// ============================================================================
// Types
// ============================================================================

export type BuildStep =
  | "ProfileResolved"
  | "EnvironmentReady"
  | "DependenciesInstalled"
  | "ManifestBuilt"
  | "Packaged"
  | "Done";

export type BuildState = "Init" | BuildStep | "Failed";

export const BUILD_STEPS: readonly BuildStep[] = [
  "ProfileResolved",
  "EnvironmentReady",
  "DependenciesInstalled",
  "ManifestBuilt",
  "Packaged",
  "Done",
];

export interface BuildTransition {
  from: BuildState;
  to: BuildState;
  /** 1-based position of the step being entered (or, for `Failed`, the step that failed). */
  index: number;
  total: number;
}

export interface BuildSuccess {
  status: "done";
  target: BuildTarget;
  artifact: PackageArtifact;
  manifest: BundleManifest;
  /** Profile warnings and skipped optional dependencies. */
  warnings: string[];
}

export interface BuildFailure {
  status: "failed";
  step: BuildStep;
  error: unknown;
}

export type BuildResult = BuildSuccess | BuildFailure;

export interface BuildPlan {
  target: BuildTarget;
  warnings: string[];
  environmentRoot: string;
  lockPath: string;
  workDir: string;
  outputDir: string;
  installs: Array<{ dependency: string; required: boolean; attempts: PlannedAttempt[] }>;
  artifact: { kind: ArtifactKind; path: string };
}

export interface OrchestratorOptions {
  config: ProjectConfig;
  runner: CommandRunner;
  compiler: ExecutableCompiler;
  /** Target overrides; the host is used for anything not given. */
  profile?: ProfileOptions;
  /** Overrides `config.outputDir`. */
  outputDir?: string;
  /** Keep the isolated environment after the build. */
  keepEnvironment?: boolean;
  signal?: AbortSignal;
  reporter?: Reporter;
  verbose?: boolean;
  packagers?: PackagerRegistry;
  /** Host platform for tool names and search-path syntax. */
  platform?: NodeJS.Platform;
  /** Environment installers inherit; defaults to `process.env`. */
  baseEnv?: NodeJS.ProcessEnv;
  lock?: LockOptions;
  /** Called as each state is entered. */
  onTransition?: (transition: BuildTransition) => void;
}

// ============================================================================
// Orchestrator
// ============================================================================

export class BuildOrchestrator {
  private readonly options: OrchestratorOptions;
  private readonly reporter: Reporter;
  private readonly outputDir: string;
  private currentState: BuildState = "Init";

  constructor(options: OrchestratorOptions) {
    this.options = options;
    this.reporter = options.reporter ?? silentReporter;
    this.outputDir = options.outputDir ?? options.config.outputDir;
  }

  get state(): BuildState {
    return this.currentState;
  }

  /**
   * Run the build to `Done` or `Failed`. Never throws.
   */
  async run(): Promise<BuildResult> {
    const { config } = this.options;
    let step: BuildStep = "ProfileResolved";
    let lock: BuildLock | undefined;
    let environment: IsolatedEnvironmentManager | undefined;

    try {
      const profile = await resolvePlatformProfile(this.profileOptions());
      const warnings = [...profile.warnings];
      for (const warning of profile.warnings) {
        this.reporter.warn(warning);
      }
      this.enter(step);

      step = "EnvironmentReady";
      this.checkInterrupted();
      const target = requireSupportedTarget(profile);
      const packager = selectPackager(target, appMetadata(config), this.packagerContext(), this.packagers());
      validateDependencyTable(config.dependencies);

      const key = targetKey(target);
      // Keyed like the environment, so one lock covers every output directory
      lock = acquireBuildLock(this.lockPath(target), {
        target: key,
        project: config.projectDir,
        output: this.outputDir,
      }, this.options.lock);

      const targetOutput = join(this.outputDir, key);
      rmSync(targetOutput, { recursive: true, force: true });
      mkdirSync(targetOutput, { recursive: true });

      environment = new IsolatedEnvironmentManager({
        buildDir: config.buildDir,
        target,
        resolver: this.resolver(),
        runner: this.options.runner,
        platform: this.options.platform,
        signal: this.options.signal,
      });
      await environment.create();
      this.enter(step);

      step = "DependenciesInstalled";
      for (const spec of config.dependencies) {
        this.checkInterrupted();
        try {
          const installed = await environment.install(spec);
          this.reporter.info(`${installed.name}@${installed.version} (${installed.strategy})`);
        } catch (error) {
          if (error instanceof DependencyUnavailableError && !error.required) {
            const message = `optional dependency ${spec.name} skipped: ${error.attempts.map((a) => `${a.strategy} (${a.failure})`).join(", ")}`;
            this.reporter.warn(message);
            warnings.push(message);
            continue;
          }
          throw error;
        }
      }
      this.enter(step);

      step = "ManifestBuilt";
      this.checkInterrupted();
      const manifest = new BundleManifestBuilder({
        projectDir: config.projectDir,
        target,
        entry: config.entry,
        dependencies: config.dependencies,
        exclusions: config.exclusions,
        requiredFiles: config.requiredFiles,
      }).build(environment.environment(), config.sourceTrees);
      this.reporter.debug(
        `manifest: ${manifest.regularFiles.length} files, ${manifest.nativeBinaries.length} native binaries, ${manifest.excluded.length} excluded`,
      );
      this.enter(step);

      step = "Packaged";
      this.checkInterrupted();
      const artifact = await packager.package(manifest, target, targetOutput, this.workDir(target));
      this.enter(step);

      step = "Done";
      this.enter(step);
      return { status: "done", target, artifact, manifest, warnings };
    } catch (error) {
      this.fail(step);
      return { status: "failed", step, error };
    } finally {
      this.cleanUp(environment, lock);
    }
  }

  /**
   * Resolve the target and describe what `run` would do, touching nothing.
   *
   * @throws ProfileUnsupportedError, ConfigurationError
   */
  async plan(): Promise<BuildPlan> {
    const { config } = this.options;
    const profile = await resolvePlatformProfile(this.profileOptions());
    const target = requireSupportedTarget(profile);
    const packager = selectPackager(target, appMetadata(config), this.packagerContext(), this.packagers());
    validateDependencyTable(config.dependencies);

    const key = targetKey(target);
    const environmentRoot = join(config.buildDir, "env", key);
    const resolver = this.resolver();
    const outputDir = join(this.outputDir, key);

    return {
      target,
      warnings: profile.warnings,
      environmentRoot,
      lockPath: this.lockPath(target),
      workDir: this.workDir(target),
      outputDir,
      installs: config.dependencies.map((spec) => ({
        dependency: spec.name,
        required: spec.required,
        attempts: resolver.plan(spec, target, environmentRoot),
      })),
      artifact: packager.plannedArtifact(target, outputDir),
    };
  }

  // --------------------------------------------------------------------------

  private enter(to: BuildStep): void {
    const from = this.currentState;
    this.currentState = to;
    this.options.onTransition?.({ from, to, index: BUILD_STEPS.indexOf(to) + 1, total: BUILD_STEPS.length });
  }

  private fail(step: BuildStep): void {
    const from = this.currentState;
    this.currentState = "Failed";
    this.options.onTransition?.({ from, to: "Failed", index: BUILD_STEPS.indexOf(step) + 1, total: BUILD_STEPS.length });
  }

  /** The environment goes first; the lock guards it until it is gone. */
  private cleanUp(environment: IsolatedEnvironmentManager | undefined, lock: BuildLock | undefined): void {
    try {
      if (environment && !this.options.keepEnvironment) {
        environment.dispose();
      }
    } catch (error) {
      this.reporter.warn(
        `could not remove ${environment?.root}: ${error instanceof Error ? error.message : String(error)}`,
      );
    } finally {
      lock?.release();
    }
  }

  private checkInterrupted(): void {
    if (this.options.signal?.aborted) {
      throw new BuildInterruptedError();
    }
  }

  private profileOptions(): ProfileOptions {
    const profile = this.options.profile ?? {};
    return {
      ...profile,
      probe: profile.probe ?? createCudaProbe(this.options.runner, { signal: this.options.signal }),
    };
  }

  private resolver(): DependencyResolver {
    return new DependencyResolver({
      runner: this.options.runner,
      baseEnv: this.options.baseEnv,
      platform: this.options.platform,
      signal: this.options.signal,
      reporter: this.reporter,
      verbose: this.options.verbose,
    });
  }

  private packagerContext(): PackagerContext {
    return {
      runner: this.options.runner,
      compiler: this.options.compiler,
      reporter: this.reporter,
      signal: this.options.signal,
      verbose: this.options.verbose,
    };
  }

  private packagers(): PackagerRegistry {
    return this.options.packagers ?? DEFAULT_PACKAGERS;
  }

  private lockPath(target: BuildTarget): string {
    return join(this.options.config.buildDir, "locks", `${targetKey(target)}.lock`);
  }

  private workDir(target: BuildTarget): string {
    return join(this.options.config.buildDir, "work", targetKey(target));
  }
}

export function appMetadata(config: ProjectConfig): AppMetadata {
  return {
    productName: config.productName,
    appId: config.appId,
    bundleIdentifier: config.bundleIdentifier,
    version: config.version,
    description: config.description,
    categories: config.categories,
    dmg: config.dmg,
    desktopShortcut: config.desktopShortcut,
    ...(config.icon ? { icon: config.icon } : {}),
    ...(config.signIdentity ? { signIdentity: config.signIdentity } : {}),
  };
}
