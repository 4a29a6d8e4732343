/**
 * Bundle manifest assembly.
 *
 * The builder walks the application's source trees and the installed
 * dependencies, drops files that belong to other operating systems, applies
 * the exclusion denylist, and then checks that nothing the application needs
 * at runtime was filtered away. The resulting manifest is what the packager
 * embeds; nothing outside it reaches the artifact.
 */

import { existsSync, statSync } from "node:fs";
import { basename, isAbsolute, join, posix, relative, resolve, sep } from "node:path";
import fg from "fast-glob";
import { DEFAULT_NATIVE_GLOBS, type DependencySpec } from "./dependencies.js";
import type { InstalledEnvironment } from "./environment.js";
import {
  ConfigurationError,
  ManifestConflictError,
  ManifestIncompleteError,
  type MissingRequiredFile,
} from "./errors.js";
import { OS_FAMILIES, type BuildTarget } from "./target.js";

// ============================================================================
// Types
// ============================================================================

export type ExclusionKind = "glob" | "substring" | "prefix";

/**
 * - `glob` matches paths relative to the root the file was collected from;
 * - `substring` matches anywhere in the destination path, ignoring case;
 * - `prefix` matches the start of the file's base name.
 */
export interface ExclusionRule {
  kind: ExclusionKind;
  pattern: string;
}

export interface FileEntry {
  /** Absolute path on the build machine. */
  source: string;
  /** Forward-slash path inside the bundle. */
  dest: string;
}

export interface NativeBinaryEntry extends FileEntry {
  /** The dependency the file came from. */
  origin: string;
}

export interface ExcludedFile {
  dest: string;
  /** The rule that removed it, as `kind:pattern`. */
  rule: string;
}

export interface BundleManifest {
  target: BuildTarget;
  /** Bundle path of the application entry point. */
  entry: string;
  regularFiles: FileEntry[];
  nativeBinaries: NativeBinaryEntry[];
  excludedPatterns: ExclusionRule[];
  /** Module specifiers the executable must resolve at runtime instead of bundling. */
  moduleHints: string[];
  /** Files dropped by platform filtering or exclusion. */
  excluded: ExcludedFile[];
}

export interface SourceTree {
  /** Directory, relative to the project or absolute. */
  path: string;
  /** Destination under `app/`; defaults to the tree's project-relative path. */
  dest?: string;
}

export interface ManifestOptions {
  projectDir: string;
  target: BuildTarget;
  /** Application entry point, relative to the project. */
  entry: string;
  dependencies: readonly DependencySpec[];
  /** Defaults to DEFAULT_EXCLUSIONS. */
  exclusions?: readonly ExclusionRule[];
  /** Bundle paths that must survive filtering; the entry is always required. */
  requiredFiles?: readonly string[];
}

// ============================================================================
// Exclusion rules
// ============================================================================

export const DEFAULT_EXCLUSIONS: readonly ExclusionRule[] = [
  { kind: "glob", pattern: "**/test/**" },
  { kind: "glob", pattern: "**/tests/**" },
  { kind: "glob", pattern: "**/__tests__/**" },
  { kind: "glob", pattern: "**/fixtures/**" },
  // The GUI shell never loads the Qt toolkit
  { kind: "prefix", pattern: "libQt" },
  { kind: "glob", pattern: "**/*.map" },
];

export function describeRule(rule: ExclusionRule): string {
  return `${rule.kind}:${rule.pattern}`;
}

/**
 * Parse `kind:pattern`. A pattern without a recognized kind is a glob.
 */
export function parseExclusionRule(text: string): ExclusionRule {
  const colon = text.indexOf(":");
  if (colon > 0) {
    const kind = text.slice(0, colon);
    if (kind === "glob" || kind === "substring" || kind === "prefix") {
      return { kind, pattern: text.slice(colon + 1) };
    }
  }
  return { kind: "glob", pattern: text };
}

// ============================================================================
// Builder
// ============================================================================

interface Candidate extends FileEntry {
  /** Directory the file was collected from; globs match relative to it. */
  root: string;
  /** Forward-slash path relative to `root`. */
  relativePath: string;
  /** Set for dependency files. */
  origin?: string;
  native: boolean;
}

export class BundleManifestBuilder {
  private readonly options: ManifestOptions;
  private readonly exclusions: readonly ExclusionRule[];
  private readonly globCache = new Map<string, Set<string>>();

  constructor(options: ManifestOptions) {
    this.options = options;
    this.exclusions = options.exclusions ?? DEFAULT_EXCLUSIONS;
  }

  /**
   * @throws ManifestConflictError when two files map to one bundle path
   * @throws ManifestIncompleteError when a required file is absent after filtering
   */
  build(env: InstalledEnvironment, sourceTrees: readonly SourceTree[]): BundleManifest {
    const { projectDir, target } = this.options;
    const entryDest = posix.join("app", toPosix(this.options.entry));
    const excluded: ExcludedFile[] = [];

    // 1. Collection
    const collected = new Map<string, Candidate>();
    const add = (candidate: Candidate): void => {
      const existing = collected.get(candidate.dest);
      if (existing && existing.source !== candidate.source) {
        throw new ManifestConflictError({ dest: candidate.dest, sources: [existing.source, candidate.source] });
      }
      if (!existing) {
        collected.set(candidate.dest, candidate);
      }
    };

    for (const tree of sourceTrees) {
      this.collectTree(tree, add);
    }

    const entrySource = resolve(projectDir, this.options.entry);
    if (existsSync(entrySource) && statSync(entrySource).isFile()) {
      add({
        source: entrySource,
        dest: entryDest,
        root: projectDir,
        relativePath: toPosix(this.options.entry),
        native: false,
      });
    }

    const hints = new Set<string>();
    const platformDropped = new Map<string, string>();
    for (const dependency of env.installed) {
      const spec = this.options.dependencies.find((d) => d.name === dependency.name);
      const packages = dependency.variant ? [dependency.name, dependency.variant] : [dependency.name];
      for (const name of packages) {
        const directory = join(env.root, "node_modules", ...name.split("/"));
        this.collectPackage(name, directory, dependency.name, spec, add, platformDropped);
      }
      for (const hint of spec?.moduleHints ?? []) {
        hints.add(hint);
      }
      for (const hint of spec?.platformModules?.[target.os]?.hints ?? []) {
        hints.add(hint);
      }
    }

    // 2. Platform-conditional inclusion
    for (const [dest, rule] of platformDropped) {
      if (collected.delete(dest)) {
        excluded.push({ dest, rule });
      }
    }

    // 3. Exclusion
    const nativeBefore = new Map<string, Candidate[]>();
    for (const candidate of collected.values()) {
      if (candidate.native && candidate.origin) {
        const list = nativeBefore.get(candidate.origin) ?? [];
        list.push(candidate);
        nativeBefore.set(candidate.origin, list);
      }
    }

    for (const candidate of [...collected.values()]) {
      const rule = this.exclusions.find((r) => this.matches(r, candidate));
      if (rule) {
        collected.delete(candidate.dest);
        excluded.push({ dest: candidate.dest, rule: describeRule(rule) });
      }
    }

    // 4. Validation
    const removedBy = new Map(excluded.map((e) => [e.dest, e.rule]));
    const missing: MissingRequiredFile[] = [];
    const required = [entryDest, ...(this.options.requiredFiles ?? []).map(toPosix)];
    for (const dest of new Set(required)) {
      if (!collected.has(dest)) {
        const rule = removedBy.get(dest);
        missing.push(rule ? { dest, removedBy: rule } : { dest });
      }
    }

    for (const spec of this.options.dependencies) {
      const natives = nativeBefore.get(spec.name);
      if (!spec.required || !natives || natives.length === 0) continue;
      if (natives.some((n) => collected.has(n.dest))) continue;
      const first = natives[0];
      const rule = removedBy.get(first.dest);
      missing.push(rule ? { dest: first.dest, removedBy: rule } : { dest: first.dest });
    }

    if (missing.length > 0) {
      throw new ManifestIncompleteError(missing);
    }

    const entries = [...collected.values()].sort((a, b) => compareDest(a.dest, b.dest));
    return {
      target,
      entry: entryDest,
      regularFiles: entries
        .filter((e) => !e.native)
        .map(({ source, dest }) => ({ source, dest })),
      nativeBinaries: entries
        .filter((e) => e.native)
        .map(({ source, dest, origin }) => ({ source, dest, origin: origin ?? "" })),
      excludedPatterns: [...this.exclusions],
      moduleHints: [...hints].sort(),
      excluded: excluded.sort((a, b) => compareDest(a.dest, b.dest)),
    };
  }

  private collectTree(tree: SourceTree, add: (candidate: Candidate) => void): void {
    const { projectDir } = this.options;
    const root = resolve(projectDir, tree.path);
    if (!existsSync(root) || !statSync(root).isDirectory()) {
      throw new ConfigurationError({
        summary: `source tree ${tree.path} is not a directory`,
        help: "fix the \"bundlesmith.sourceTrees\" entry in package.json",
      });
    }

    const treeDest = tree.dest ?? defaultTreeDest(projectDir, root);
    for (const relativePath of walk(root)) {
      add({
        source: join(root, relativePath),
        dest: posix.join("app", treeDest, relativePath),
        root,
        relativePath,
        native: false,
      });
    }
  }

  private collectPackage(
    name: string,
    directory: string,
    origin: string,
    spec: DependencySpec | undefined,
    add: (candidate: Candidate) => void,
    platformDropped: Map<string, string>,
  ): void {
    if (!existsSync(directory)) return;

    const nativeGlobs = spec?.nativeLibraries ?? DEFAULT_NATIVE_GLOBS;
    const native = this.globSet(directory, nativeGlobs);
    const runtimeData = spec?.runtimeData ? this.globSet(directory, spec.runtimeData) : new Set<string>();

    for (const relativePath of walk(directory)) {
      const dest = posix.join("node_modules", name, relativePath);
      add({
        source: join(directory, relativePath),
        dest,
        root: directory,
        relativePath,
        origin,
        native: native.has(relativePath) || runtimeData.has(relativePath),
      });
    }

    // Another OS family's backend is dropped unless this OS claims the same file
    const own = spec?.platformModules?.[this.options.target.os];
    const kept = own ? this.globSet(directory, own.files) : new Set<string>();
    for (const os of OS_FAMILIES) {
      if (os === this.options.target.os) continue;
      const module = spec?.platformModules?.[os];
      if (!module) continue;
      for (const relativePath of this.globSet(directory, module.files)) {
        if (!kept.has(relativePath)) {
          platformDropped.set(posix.join("node_modules", name, relativePath), `platform:${os}`);
        }
      }
    }
  }

  private matches(rule: ExclusionRule, candidate: Candidate): boolean {
    switch (rule.kind) {
      case "glob":
        return this.globSet(candidate.root, [rule.pattern]).has(candidate.relativePath);
      case "substring":
        return candidate.dest.toLowerCase().includes(rule.pattern.toLowerCase());
      case "prefix":
        return basename(candidate.dest).startsWith(rule.pattern);
    }
  }

  private globSet(root: string, patterns: readonly string[]): Set<string> {
    const key = `${root}\0${patterns.join("\0")}`;
    let set = this.globCache.get(key);
    if (!set) {
      set = new Set(fg.sync([...patterns], { cwd: root, dot: true, onlyFiles: true, followSymbolicLinks: false }));
      this.globCache.set(key, set);
    }
    return set;
  }
}

// ============================================================================
// Helpers
// ============================================================================

/** Every regular file under `root`, as sorted forward-slash relative paths. */
function walk(root: string): string[] {
  return fg.sync("**/*", { cwd: root, dot: true, onlyFiles: true, followSymbolicLinks: false }).sort();
}

function toPosix(path: string): string {
  return path.split(sep).join("/").replace(/^\.\//, "");
}

function defaultTreeDest(projectDir: string, root: string): string {
  const rel = relative(projectDir, root);
  // Trees outside the project land under their own directory name
  if (rel === "") return ".";
  if (rel.startsWith("..") || isAbsolute(rel)) return basename(root);
  return toPosix(rel);
}

function compareDest(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/** Total number of entries the packager will embed. */
export function manifestSize(manifest: BundleManifest): number {
  return manifest.regularFiles.length + manifest.nativeBinaries.length;
}
