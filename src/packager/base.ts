/**
 * Shared packaging procedure.
 *
 * Every platform packager follows the same outline: stage the manifest into a
 * private work directory under the build directory, compile the
 * self-contained executable, assemble the platform artifact around it, verify
 * the artifact, and only then move it into the target's output directory.
 * The output directory never holds a partial artifact.
 */

import { copyFileSync, cpSync, existsSync, lstatSync, mkdirSync, readdirSync, renameSync, rmSync } from "node:fs";
import { basename, dirname, join } from "node:path";
import { PackagingFailedError } from "../errors.js";
import { errnoCode } from "../lock.js";
import type { BundleManifest } from "../manifest.js";
import { formatCommand, tailOutput, type CommandRunner } from "../process.js";
import { silentReporter, type Reporter } from "../reporter.js";
import type { BuildTarget, OsFamily } from "../target.js";
import type { ExecutableCompiler } from "./compiler.js";

// ============================================================================
// Types
// ============================================================================

export type ArtifactKind = "app_bundle" | "disk_image" | "installer_exe" | "filesystem_image";

export interface PackageArtifact {
  target: BuildTarget;
  kind: ArtifactKind;
  /** Absolute path of the file (or, for an app bundle, directory). */
  path: string;
  sizeBytes: number;
}

/** Application identity and per-platform packaging switches. */
export interface AppMetadata {
  productName: string;
  appId: string;
  bundleIdentifier: string;
  version: string;
  description: string;
  icon?: string;
  categories: string[];
  signIdentity?: string;
  dmg: boolean;
  desktopShortcut: boolean;
}

export interface PackagerContext {
  runner: CommandRunner;
  compiler: ExecutableCompiler;
  reporter?: Reporter;
  signal?: AbortSignal;
  verbose?: boolean;
}

export interface Packager {
  readonly os: OsFamily;
  /** The artifact a build would produce, without building it. */
  plannedArtifact(target: BuildTarget, outputDir: string): { kind: ArtifactKind; path: string };
  /**
   * Produce the artifact for `target` inside `outputDir`, replacing any
   * previous one. Everything is assembled in `workDir`, which is removed
   * afterwards.
   *
   * @throws PackagingFailedError when the artifact is missing or empty
   */
  package(manifest: BundleManifest, target: BuildTarget, outputDir: string, workDir: string): Promise<PackageArtifact>;
}

/** What `assemble` hands back: an artifact inside the work directory. */
export interface AssembledArtifact {
  kind: ArtifactKind;
  path: string;
}

export interface PackagingJob {
  manifest: BundleManifest;
  target: BuildTarget;
  /** Scratch space, removed after packaging. */
  workDir: string;
  /** The staged manifest contents. */
  payloadDir: string;
}

// ============================================================================
// Helpers
// ============================================================================

/** Total size in bytes of a file or directory tree. Symlinks count as themselves. */
export function pathSize(path: string): number {
  const stats = lstatSync(path);
  if (!stats.isDirectory()) {
    return stats.size;
  }
  let total = 0;
  for (const entry of readdirSync(path)) {
    total += pathSize(join(path, entry));
  }
  return total;
}

/** `LocalLLM Studio` → `LocalLLM-Studio`, for artifact file names. */
export function artifactBaseName(productName: string): string {
  return productName.trim().replace(/\s+/g, "-");
}

/**
 * Copy every manifest entry to its bundle path under `payloadDir`.
 */
export function stageManifest(manifest: BundleManifest, payloadDir: string): void {
  for (const entry of [...manifest.regularFiles, ...manifest.nativeBinaries]) {
    const destination = join(payloadDir, ...entry.dest.split("/"));
    mkdirSync(dirname(destination), { recursive: true });
    copyFileSync(entry.source, destination);
  }
}

/**
 * Rename `source` to `destination`. Across filesystems the tree is copied
 * next to the destination first, so `destination` only ever appears whole.
 */
export function movePath(
  source: string,
  destination: string,
  rename: (from: string, to: string) => void = renameSync,
): void {
  try {
    rename(source, destination);
    return;
  } catch (error) {
    if (errnoCode(error) !== "EXDEV") throw error;
  }

  const partial = `${destination}.partial`;
  rmSync(partial, { recursive: true, force: true });
  try {
    cpSync(source, partial, { recursive: true, verbatimSymlinks: true });
    renameSync(partial, destination);
  } finally {
    rmSync(partial, { recursive: true, force: true });
  }
  rmSync(source, { recursive: true, force: true });
}

// ============================================================================
// Base class
// ============================================================================

export abstract class BasePackager implements Packager {
  abstract readonly os: OsFamily;

  protected readonly app: AppMetadata;
  protected readonly context: PackagerContext;
  protected readonly reporter: Reporter;

  constructor(app: AppMetadata, context: PackagerContext) {
    this.app = app;
    this.context = context;
    this.reporter = context.reporter ?? silentReporter;
  }

  abstract plannedArtifact(target: BuildTarget, outputDir: string): { kind: ArtifactKind; path: string };

  /** Build the platform artifact inside `job.workDir`. */
  protected abstract assemble(job: PackagingJob): Promise<AssembledArtifact>;

  /** Runs once the artifact is at its final path. */
  protected async afterPublish(_artifact: PackageArtifact): Promise<void> {}

  async package(
    manifest: BundleManifest,
    target: BuildTarget,
    outputDir: string,
    workDir: string,
  ): Promise<PackageArtifact> {
    const payloadDir = join(workDir, "payload");
    rmSync(workDir, { recursive: true, force: true });
    mkdirSync(payloadDir, { recursive: true });
    mkdirSync(outputDir, { recursive: true });

    try {
      stageManifest(manifest, payloadDir);
      const assembled = await this.assemble({ manifest, target, workDir, payloadDir });

      if (!existsSync(assembled.path)) {
        throw new PackagingFailedError({
          expected: basename(assembled.path),
          reason: `${assembled.path} does not exist after packaging`,
        });
      }
      if (pathSize(assembled.path) === 0) {
        throw new PackagingFailedError({
          expected: basename(assembled.path),
          reason: `${assembled.path} is empty`,
        });
      }

      const finalPath = join(outputDir, basename(assembled.path));
      rmSync(finalPath, { recursive: true, force: true });
      movePath(assembled.path, finalPath);

      const artifact: PackageArtifact = {
        target,
        kind: assembled.kind,
        path: finalPath,
        sizeBytes: pathSize(finalPath),
      };
      await this.afterPublish(artifact);
      return artifact;
    } finally {
      rmSync(workDir, { recursive: true, force: true });
    }
  }

  /** Compile the staged payload into a single executable at `output`. */
  protected async compileExecutable(job: PackagingJob, output: string): Promise<void> {
    mkdirSync(dirname(output), { recursive: true });
    try {
      await this.context.compiler.compile({
        payloadDir: job.payloadDir,
        entry: job.manifest.entry,
        externals: externalModules(job.manifest),
        target: job.target,
        output,
        appId: this.app.appId,
        version: this.app.version,
      });
    } catch (error) {
      if (error instanceof PackagingFailedError) throw error;
      throw new PackagingFailedError({
        expected: basename(output),
        reason: `compiling the executable failed: ${error instanceof Error ? error.message : String(error)}`,
        cause: error,
      });
    }
  }

  /**
   * Run a packaging tool; a non-zero exit fails the build with its output.
   */
  protected async runTool(
    command: string,
    args: string[],
    expected: string,
    env?: NodeJS.ProcessEnv,
  ): Promise<void> {
    this.reporter.debug(formatCommand(command, args));
    const result = await this.context.runner.run(command, args, {
      env: env ? { ...process.env, ...env } : undefined,
      verbose: this.context.verbose,
      signal: this.context.signal,
    });
    if (result.exitCode !== 0) {
      const output = tailOutput(result);
      throw new PackagingFailedError({
        expected,
        reason: `${command} exited with code ${result.exitCode}` + (output ? `: ${output}` : ""),
      });
    }
  }
}

/**
 * Modules the bundled launcher must load from the payload at runtime: the
 * manifest's hints plus every package that ships native binaries.
 */
export function externalModules(manifest: BundleManifest): string[] {
  const origins = new Set(manifest.nativeBinaries.map((entry) => entry.origin).filter((o) => o !== ""));
  return [...new Set([...manifest.moduleHints, ...origins])].sort();
}
