/**
 * bundlesmith - build and package local LLM desktop applications.
 *
 * The CLI (`bundlesmith build`) drives everything below; the exports are for
 * build scripts that want to run the pipeline, or a single stage of it,
 * programmatically.
 */

export {
  ACCELERATIONS,
  CPU_ARCHES,
  createBuildTarget,
  describeTarget,
  OS_FAMILIES,
  targetKey,
  type Acceleration,
  type AccelerationRequest,
  type BuildTarget,
  type CpuArch,
  type OsFamily,
} from "./target.js";

export {
  BuildInterruptedError,
  BuildLockedError,
  BundlesmithError,
  ConfigurationError,
  DependencyUnavailableError,
  EnvironmentCreationFailedError,
  ErrorCode,
  formatDiagnostic,
  ManifestConflictError,
  ManifestIncompleteError,
  PackagingFailedError,
  ProfileUnsupportedError,
  type StrategyAttempt,
} from "./errors.js";

export {
  createCudaProbe,
  requireSupportedTarget,
  resolvePlatformProfile,
  type AccelerationProbe,
  type HostInfo,
  type PlatformProfile,
  type ProfileOptions,
} from "./profile.js";

export {
  DEFAULT_DEPENDENCIES,
  type AcquisitionStrategy,
  type DependencySpec,
  type SourceBuild,
} from "./dependencies.js";

export {
  DependencyResolver,
  describeAttempt,
  flagVariables,
  sanitizeBuildEnv,
  type InstalledDependency,
  type PlannedAttempt,
} from "./resolver.js";
export { IsolatedEnvironmentManager, type InstalledEnvironment } from "./environment.js";
export {
  BundleManifestBuilder,
  DEFAULT_EXCLUSIONS,
  type BundleManifest,
  type ExclusionRule,
  type SourceTree,
} from "./manifest.js";

export {
  DEFAULT_LINUX_ICON,
  DEFAULT_PACKAGERS,
  movePath,
  PkgCompiler,
  selectPackager,
  type ExecutableCompiler,
  type PackageArtifact,
  type Packager,
} from "./packager/index.js";

export { loadProjectConfig, type ProjectConfig } from "./config.js";
export {
  BUILD_STEPS,
  BuildOrchestrator,
  type BuildResult,
  type BuildState,
  type BuildStep,
  type OrchestratorOptions,
} from "./orchestrator.js";
export { cudaBuildStep, renderDockerfile, type DockerBuildStep, type DockerVariant } from "./dockerfile.js";
export { ProcessRunner, type CommandRunner, type CommandResult } from "./process.js";
export type { Reporter } from "./reporter.js";
