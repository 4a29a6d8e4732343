/**
 * Project configuration, read from the application's package.json.
 *
 * Application metadata comes from the standard package.json fields; build
 * settings live under a "bundlesmith" key:
 *
 * ```json
 * {
 *   "name": "localllm-studio",
 *   "productName": "LocalLLM Studio",
 *   "version": "1.2.0",
 *   "main": "server/main.js",
 *   "bundlesmith": {
 *     "sourceTrees": ["server", { "path": "ui/dist", "dest": "ui" }],
 *     "exclude": ["substring:benchmark"],
 *     "dmg": true
 *   }
 * }
 * ```
 *
 * Every field is validated here so later stages can trust the types.
 */

import { existsSync, readFileSync } from "node:fs";
import { join, resolve } from "node:path";
import {
  DEFAULT_DEPENDENCIES,
  type AcquisitionStrategy,
  type SourceBuild,
  type DependencySpec,
  type PlatformModule,
} from "./dependencies.js";
import { ConfigurationError } from "./errors.js";
import { DEFAULT_EXCLUSIONS, parseExclusionRule, type ExclusionRule, type SourceTree } from "./manifest.js";
import { isAcceleration, isOsFamily, type Acceleration, type OsFamily } from "./target.js";

// ============================================================================
// Types
// ============================================================================

export interface ProjectConfig {
  projectDir: string;
  /** Display name, e.g. `LocalLLM Studio`. */
  productName: string;
  /** File-system safe identifier used for executables and desktop entries. */
  appId: string;
  /** Reverse-DNS identifier, e.g. `com.localllm.studio`. */
  bundleIdentifier: string;
  version: string;
  description: string;
  /** Application entry point, relative to the project. */
  entry: string;
  sourceTrees: SourceTree[];
  requiredFiles: string[];
  exclusions: ExclusionRule[];
  dependencies: DependencySpec[];
  /** Absolute path of the application icon. */
  icon?: string;
  /** Wrap the macOS app bundle in a disk image. */
  dmg: boolean;
  /** Create a desktop shortcut for the Windows executable. */
  desktopShortcut: boolean;
  /** codesign identity; unsigned when absent. */
  signIdentity?: string;
  /** Freedesktop menu categories. */
  categories: string[];
  /** Transient environments and work directories. */
  buildDir: string;
  /** Final artifacts. */
  outputDir: string;
}

type JsonObject = Record<string, unknown>;

// ============================================================================
// Field validation
// ============================================================================

function isObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function invalid(field: string, expected: string): ConfigurationError {
  return new ConfigurationError({
    summary: `invalid "bundlesmith.${field}" in package.json`,
    help: `expected ${expected}`,
  });
}

function optionalString(config: JsonObject, field: string): string | undefined {
  const value = config[field];
  if (value === undefined) return undefined;
  if (typeof value !== "string" || value === "") throw invalid(field, "a non-empty string");
  return value;
}

function optionalBoolean(config: JsonObject, field: string): boolean | undefined {
  const value = config[field];
  if (value === undefined) return undefined;
  if (typeof value !== "boolean") throw invalid(field, "true or false");
  return value;
}

function stringArray(value: unknown, field: string): string[] {
  if (!Array.isArray(value) || !value.every((v): v is string => typeof v === "string")) {
    throw invalid(field, "an array of strings");
  }
  return value;
}

function optionalStringArray(config: JsonObject, field: string): string[] | undefined {
  const value = config[field];
  return value === undefined ? undefined : stringArray(value, field);
}

function parseSourceTrees(value: unknown): SourceTree[] {
  if (value === undefined) return [];
  if (!Array.isArray(value)) throw invalid("sourceTrees", "an array");
  return value.map((item, index): SourceTree => {
    if (typeof item === "string") return { path: item };
    if (isObject(item) && typeof item.path === "string") {
      if (item.dest !== undefined && typeof item.dest !== "string") {
        throw invalid(`sourceTrees[${index}].dest`, "a string");
      }
      return typeof item.dest === "string" ? { path: item.path, dest: item.dest } : { path: item.path };
    }
    throw invalid(`sourceTrees[${index}]`, "a path or { \"path\", \"dest\" }");
  });
}

function parseExclusions(value: unknown): ExclusionRule[] {
  if (value === undefined) return [];
  if (!Array.isArray(value)) throw invalid("exclude", "an array");
  return value.map((item, index): ExclusionRule => {
    if (typeof item === "string") return parseExclusionRule(item);
    if (
      isObject(item)
      && (item.kind === "glob" || item.kind === "substring" || item.kind === "prefix")
      && typeof item.pattern === "string"
    ) {
      return { kind: item.kind, pattern: item.pattern };
    }
    throw invalid(`exclude[${index}]`, "\"kind:pattern\" or { \"kind\", \"pattern\" }");
  });
}

// ============================================================================
// Dependency table
// ============================================================================

function parseAccelerationMap(value: unknown, field: string): Partial<Record<Acceleration, string[]>> {
  if (!isObject(value)) throw invalid(field, "an object keyed by none, metal or cuda");
  const result: Partial<Record<Acceleration, string[]>> = {};
  for (const [key, items] of Object.entries(value)) {
    if (!isAcceleration(key)) throw invalid(field, "keys none, metal or cuda");
    result[key] = stringArray(items, `${field}.${key}`);
  }
  return result;
}

function parseSourceBuild(value: unknown, field: string): SourceBuild {
  if (!isObject(value)) throw invalid(field, "an object with a \"command\"");
  const command = stringArray(value.command, `${field}.command`);
  if (command.length === 0) throw invalid(`${field}.command`, "a binary name and its arguments");

  let env: Record<string, string> | undefined;
  if (value.env !== undefined) {
    if (!isObject(value.env)) throw invalid(`${field}.env`, "an object of strings");
    env = {};
    for (const [name, setting] of Object.entries(value.env)) {
      if (typeof setting !== "string") throw invalid(`${field}.env.${name}`, "a string");
      env[name] = setting;
    }
  }
  const accelerationArgs = value.accelerationArgs === undefined
    ? undefined
    : parseAccelerationMap(value.accelerationArgs, `${field}.accelerationArgs`);
  return {
    command,
    ...(accelerationArgs ? { accelerationArgs } : {}),
    ...(env ? { env } : {}),
  };
}

function parseStrategy(value: unknown, field: string): AcquisitionStrategy {
  if (!isObject(value)) throw invalid(field, "an object with a \"strategy\"");
  const parameters = value.parameters ?? {};
  if (!isObject(parameters)) throw invalid(`${field}.parameters`, "an object");

  switch (value.strategy) {
    case "prebuilt": {
      const registry = optionalString(parameters, "registry");
      let variants: Record<string, string> | undefined;
      if (parameters.variants !== undefined) {
        if (!isObject(parameters.variants)) throw invalid(`${field}.parameters.variants`, "an object");
        variants = {};
        for (const [key, name] of Object.entries(parameters.variants)) {
          if (typeof name !== "string") throw invalid(`${field}.parameters.variants.${key}`, "a package name");
          variants[key] = name;
        }
      }
      return {
        strategy: "prebuilt",
        parameters: { ...(registry ? { registry } : {}), ...(variants ? { variants } : {}) },
      };
    }

    case "source": {
      const flagsEnv = optionalString(parameters, "flagsEnv");
      const flagEnvPrefix = optionalString(parameters, "flagEnvPrefix");
      const conflictingMarkers = optionalStringArray(parameters, "conflictingMarkers");
      const accelerationFlags = parameters.accelerationFlags === undefined
        ? undefined
        : parseAccelerationMap(parameters.accelerationFlags, `${field}.parameters.accelerationFlags`);
      const build = parameters.build === undefined
        ? undefined
        : parseSourceBuild(parameters.build, `${field}.parameters.build`);
      return {
        strategy: "source",
        parameters: {
          ...(flagsEnv ? { flagsEnv } : {}),
          ...(flagEnvPrefix ? { flagEnvPrefix } : {}),
          ...(accelerationFlags ? { accelerationFlags } : {}),
          ...(conflictingMarkers ? { conflictingMarkers } : {}),
          ...(build ? { build } : {}),
        },
      };
    }

    case "local": {
      const path = optionalString(parameters, "path");
      if (!path) throw invalid(`${field}.parameters.path`, "a directory or tarball path");
      return { strategy: "local", parameters: { path } };
    }

    default:
      throw invalid(`${field}.strategy`, "\"prebuilt\", \"source\" or \"local\"");
  }
}

function parsePlatformModules(value: unknown, field: string): Partial<Record<OsFamily, PlatformModule>> {
  if (!isObject(value)) throw invalid(field, "an object keyed by macos, windows or linux");
  const result: Partial<Record<OsFamily, PlatformModule>> = {};
  for (const [os, module] of Object.entries(value)) {
    if (!isOsFamily(os) || !isObject(module)) {
      throw invalid(field, "an object keyed by macos, windows or linux");
    }
    const hints = optionalStringArray(module, "hints");
    result[os] = {
      files: stringArray(module.files, `${field}.${os}.files`),
      ...(hints ? { hints } : {}),
    };
  }
  return result;
}

function parseDependency(value: unknown, index: number, projectDir: string): DependencySpec {
  const field = `dependencies[${index}]`;
  if (!isObject(value)) throw invalid(field, "an object");
  const name = value.name;
  if (typeof name !== "string" || name === "") {
    throw invalid(`${field}.name`, "a package name");
  }
  const required = value.required;
  if (required !== undefined && typeof required !== "boolean") {
    throw invalid(`${field}.required`, "true or false");
  }
  if (!Array.isArray(value.acquisitionOrder)) {
    throw invalid(`${field}.acquisitionOrder`, "an array of strategies");
  }

  const acquisitionOrder = value.acquisitionOrder.map((s: unknown, i: number): AcquisitionStrategy => {
    const strategy = parseStrategy(s, `${field}.acquisitionOrder[${i}]`);
    // Local paths are relative to the project, not to wherever npm runs
    return strategy.strategy === "local"
      ? { strategy: "local" as const, parameters: { path: resolve(projectDir, strategy.parameters.path) } }
      : strategy;
  });

  const version = optionalString(value, "version");
  const nativeLibraries = optionalStringArray(value, "nativeLibraries");
  const runtimeData = optionalStringArray(value, "runtimeData");
  const moduleHints = optionalStringArray(value, "moduleHints");
  return {
    name,
    required: required ?? true,
    acquisitionOrder,
    ...(version ? { version } : {}),
    ...(nativeLibraries ? { nativeLibraries } : {}),
    ...(runtimeData ? { runtimeData } : {}),
    ...(moduleHints ? { moduleHints } : {}),
    ...(value.platformModules !== undefined
      ? { platformModules: parsePlatformModules(value.platformModules, `${field}.platformModules`) }
      : {}),
  };
}

/**
 * Overlay project dependencies on the defaults: an entry with a default's
 * name replaces it, any other entry is appended.
 */
export function mergeDependencies(
  defaults: readonly DependencySpec[],
  overrides: readonly DependencySpec[],
): DependencySpec[] {
  const merged = defaults.map((spec) => overrides.find((o) => o.name === spec.name) ?? spec);
  for (const override of overrides) {
    if (!defaults.some((d) => d.name === override.name)) {
      merged.push(override);
    }
  }
  return merged;
}

// ============================================================================
// Loading
// ============================================================================

/** `@scope/My App` → `my-app`. */
export function slugify(name: string): string {
  return name
    .replace(/^@[^/]+\//, "")
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "");
}

/**
 * Read and validate the configuration of the project at `projectDir`.
 *
 * @throws ConfigurationError when package.json is missing, unreadable or
 *   has an invalid "bundlesmith" field
 */
export function loadProjectConfig(projectDir: string): ProjectConfig {
  const pkgPath = join(projectDir, "package.json");
  if (!existsSync(pkgPath)) {
    throw new ConfigurationError({
      summary: `no package.json in ${projectDir}`,
      help: "run bundlesmith from the application's directory, or pass --project <dir>",
    });
  }

  let pkg: unknown;
  try {
    pkg = JSON.parse(readFileSync(pkgPath, "utf-8"));
  } catch (error) {
    throw new ConfigurationError({
      summary: `could not parse ${pkgPath}`,
      help: "fix the JSON syntax error",
      notes: [error instanceof Error ? error.message : String(error)],
    });
  }
  if (!isObject(pkg)) {
    throw new ConfigurationError({
      summary: `${pkgPath} does not contain a JSON object`,
      help: "fix the package.json contents",
    });
  }

  const config = pkg.bundlesmith ?? {};
  if (!isObject(config)) {
    throw new ConfigurationError({
      summary: "invalid \"bundlesmith\" in package.json",
      help: "expected an object",
    });
  }

  const name = typeof pkg.name === "string" ? pkg.name : "";
  const productName = optionalString(config, "productName")
    ?? (typeof pkg.productName === "string" ? pkg.productName : undefined)
    ?? name;
  if (!productName) {
    throw new ConfigurationError({
      summary: "the application has no name",
      help: "set \"name\" or \"productName\" in package.json",
    });
  }

  const appId = optionalString(config, "appId") ?? slugify(name || productName);
  const bundleIdentifier = optionalString(config, "bundleIdentifier") ?? `com.${appId.replace(/-/g, ".")}`;
  const version = typeof pkg.version === "string" ? pkg.version : "0.0.0";
  const description = typeof pkg.description === "string" ? pkg.description : productName;
  const entry = optionalString(config, "entry")
    ?? (typeof pkg.main === "string" ? pkg.main : "index.js");

  let overrides: DependencySpec[] = [];
  if (config.dependencies !== undefined) {
    if (!Array.isArray(config.dependencies)) throw invalid("dependencies", "an array");
    overrides = config.dependencies.map((d: unknown, i: number) => parseDependency(d, i, projectDir));
  }

  const useDefaultExclusions = optionalBoolean(config, "defaultExclusions") ?? true;
  const icon = optionalString(config, "icon");
  const signIdentity = optionalString(config, "signIdentity");

  return {
    projectDir,
    productName,
    appId,
    bundleIdentifier,
    version,
    description,
    entry,
    sourceTrees: parseSourceTrees(config.sourceTrees),
    requiredFiles: optionalStringArray(config, "requiredFiles") ?? [],
    exclusions: [
      ...(useDefaultExclusions ? DEFAULT_EXCLUSIONS : []),
      ...parseExclusions(config.exclude),
    ],
    dependencies: mergeDependencies(DEFAULT_DEPENDENCIES, overrides),
    ...(icon ? { icon: resolve(projectDir, icon) } : {}),
    dmg: optionalBoolean(config, "dmg") ?? true,
    desktopShortcut: optionalBoolean(config, "desktopShortcut") ?? false,
    ...(signIdentity ? { signIdentity } : {}),
    categories: optionalStringArray(config, "categories") ?? ["Utility", "Development"],
    buildDir: resolve(projectDir, optionalString(config, "buildDir") ?? "build"),
    outputDir: resolve(projectDir, optionalString(config, "outputDir") ?? "dist"),
  };
}
