/**
 * Build-scoped, disposable npm prefixes.
 *
 * Each build target gets its own prefix at `<buildDir>/env/<target-key>`,
 * recreated from nothing at the start of every build so that no state leaks
 * from a previous run or from another target.
 */

import { mkdirSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import type { DependencySpec } from "./dependencies.js";
import { EnvironmentCreationFailedError } from "./errors.js";
import { formatCommand, npmCommand, tailOutput, type CommandRunner } from "./process.js";
import type { DependencyResolver, InstalledDependency } from "./resolver.js";
import { targetKey, type BuildTarget } from "./target.js";

export interface InstalledEnvironment {
  /** The npm prefix; packages land in `<root>/node_modules`. */
  root: string;
  /** The target key the environment belongs to. */
  scope: string;
  installed: readonly InstalledDependency[];
}

export interface EnvironmentOptions {
  buildDir: string;
  target: BuildTarget;
  resolver: DependencyResolver;
  runner: CommandRunner;
  platform?: NodeJS.Platform;
  signal?: AbortSignal;
}

export class IsolatedEnvironmentManager {
  readonly root: string;
  readonly scope: string;

  private readonly target: BuildTarget;
  private readonly resolver: DependencyResolver;
  private readonly runner: CommandRunner;
  private readonly platform: NodeJS.Platform;
  private readonly signal: AbortSignal | undefined;
  private readonly installed: InstalledDependency[] = [];
  private created = false;

  constructor(options: EnvironmentOptions) {
    this.target = options.target;
    this.scope = targetKey(options.target);
    this.root = join(options.buildDir, "env", this.scope);
    this.resolver = options.resolver;
    this.runner = options.runner;
    this.platform = options.platform ?? process.platform;
    this.signal = options.signal;
  }

  /**
   * Remove any previous environment for this scope and provision an empty one.
   *
   * @throws EnvironmentCreationFailedError when the directory cannot be
   *   prepared or npm cannot run
   */
  async create(): Promise<InstalledEnvironment> {
    try {
      rmSync(this.root, { recursive: true, force: true });
      mkdirSync(this.root, { recursive: true });
      writeFileSync(
        join(this.root, "package.json"),
        JSON.stringify({ name: `bundlesmith-env-${this.scope}`, version: "0.0.0", private: true }, null, 2) + "\n",
      );
    } catch (error) {
      throw new EnvironmentCreationFailedError({
        root: this.root,
        reason: error instanceof Error ? error.message : String(error),
        cause: error,
      });
    }

    const command = npmCommand(this.platform);
    const result = await this.runner.run(command, ["--version"], {
      cwd: this.root,
      signal: this.signal,
    });
    if (result.exitCode !== 0) {
      const output = tailOutput(result);
      throw new EnvironmentCreationFailedError({
        root: this.root,
        reason: `${formatCommand(command, ["--version"])} exited with code ${result.exitCode}`
          + (output ? `: ${output}` : ""),
      });
    }

    this.installed.length = 0;
    this.created = true;
    return this.environment();
  }

  /**
   * Install one dependency through the resolver and record it.
   *
   * The resolver's errors propagate unchanged.
   */
  async install(spec: DependencySpec): Promise<InstalledDependency> {
    if (!this.created) {
      throw new Error(`environment ${this.scope} has not been created`);
    }
    const dependency = await this.resolver.resolve(spec, this.target, this.root);
    this.installed.push(dependency);
    return dependency;
  }

  environment(): InstalledEnvironment {
    return { root: this.root, scope: this.scope, installed: [...this.installed] };
  }

  dispose(): void {
    rmSync(this.root, { recursive: true, force: true });
    this.installed.length = 0;
    this.created = false;
  }
}
