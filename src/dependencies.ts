/**
 * Dependency specifications: what the application needs installed into the
 * isolated environment, and the ordered ways of getting each package.
 *
 * The default table covers the three packages the desktop application
 * embeds. Projects can override or extend it under "bundlesmith.dependencies"
 * in package.json (see config.ts).
 */

import { ConfigurationError } from "./errors.js";
import type { Acceleration, OsFamily } from "./target.js";

// ============================================================================
// Types
// ============================================================================

export type StrategyKind = "prebuilt" | "source" | "local";

/** Install a published package, plus an acceleration-specific variant if one exists. */
export interface PrebuiltStrategy {
  strategy: "prebuilt";
  parameters: {
    /** Alternate registry URL for prebuilt artifacts. */
    registry?: string;
    /** Extra package to install per target key (e.g. `linux-x86_64-cuda`). */
    variants?: Record<string, string>;
  };
}

/**
 * A package's own compile step, run through `npm exec` inside the
 * environment once the package is installed.
 */
export interface SourceBuild {
  /** The package binary and its arguments. */
  command: string[];
  /** Arguments appended for the target's acceleration. */
  accelerationArgs?: Partial<Record<Acceleration, string[]>>;
  /** Extra variables for both the install and the compile step. */
  env?: Record<string, string>;
}

/**
 * Compile from source with acceleration flags.
 *
 * Without `build`, npm compiles during install (`--build-from-source`).
 * Flags reach the compiler either joined into one variable (`flagsEnv`) or,
 * with `flagEnvPrefix`, one variable per `-DNAME=VALUE` flag.
 */
export interface SourceStrategy {
  strategy: "source";
  parameters: {
    /** Environment variable the native build reads its flags from. Defaults to CMAKE_ARGS. */
    flagsEnv?: string;
    /** Prefix for per-flag variables, e.g. `NODE_LLAMA_CPP_CMAKE_OPTION_`. */
    flagEnvPrefix?: string;
    /** Per-acceleration build flags; defaults to DEFAULT_ACCELERATION_FLAGS. */
    accelerationFlags?: Partial<Record<Acceleration, string[]>>;
    /** Search-path markers of distributions whose toolchains conflict with the build. */
    conflictingMarkers?: string[];
    build?: SourceBuild;
  };
}

/** Install from a local directory or tarball. */
export interface LocalStrategy {
  strategy: "local";
  parameters: {
    path: string;
  };
}

export type AcquisitionStrategy = PrebuiltStrategy | SourceStrategy | LocalStrategy;

/** Files and module hints that only belong in one OS family's bundle. */
export interface PlatformModule {
  /** Globs relative to the package directory. */
  files: string[];
  /** Module specifiers the bundler must leave external for this OS. */
  hints?: string[];
}

export interface DependencySpec {
  /** npm package name. */
  name: string;
  /** Semver range; defaults to latest. */
  version?: string;
  required: boolean;
  /** Tried in order; prebuilt strategies always run before source ones. */
  acquisitionOrder: AcquisitionStrategy[];
  /** Native library globs relative to the package; defaults to DEFAULT_NATIVE_GLOBS. */
  nativeLibraries?: string[];
  /** Auxiliary files the native code loads at runtime (shaders, kernels). */
  runtimeData?: string[];
  platformModules?: Partial<Record<OsFamily, PlatformModule>>;
  moduleHints?: string[];
}

// ============================================================================
// Defaults
// ============================================================================

export const DEFAULT_NATIVE_GLOBS = ["**/*.node", "**/*.dylib", "**/*.so", "**/*.so.*", "**/*.dll"];

export const DEFAULT_ACCELERATION_FLAGS: Record<Acceleration, string[]> = {
  metal: ["-DGGML_METAL=ON"],
  cuda: ["-DGGML_CUDA=ON"],
  none: ["-DGGML_NATIVE=OFF"],
};

/** Python distributions that prepend their own compilers and libraries to PATH. */
export const DEFAULT_CONFLICTING_MARKERS = ["anaconda", "miniconda", "miniforge", "mambaforge"];

export const DEFAULT_DEPENDENCIES: readonly DependencySpec[] = [
  {
    name: "node-llama-cpp",
    version: "^3.0.0",
    required: true,
    acquisitionOrder: [
      {
        strategy: "prebuilt",
        parameters: {
          variants: {
            "linux-x86_64-cuda": "@node-llama-cpp/linux-x64-cuda",
            "windows-x86_64-cuda": "@node-llama-cpp/win-x64-cuda",
          },
        },
      },
      {
        strategy: "source",
        parameters: {
          flagEnvPrefix: "NODE_LLAMA_CPP_CMAKE_OPTION_",
          build: {
            command: ["node-llama-cpp", "source", "download"],
            accelerationArgs: {
              metal: ["--gpu", "metal"],
              cuda: ["--gpu", "cuda"],
              none: ["--gpu", "false"],
            },
            // The compile step replaces the postinstall binary download
            env: { NODE_LLAMA_CPP_SKIP_DOWNLOAD: "true" },
          },
        },
      },
    ],
    runtimeData: ["llama/**/*.metal"],
  },
  {
    name: "webview-nodejs",
    required: true,
    acquisitionOrder: [{ strategy: "prebuilt", parameters: {} }],
    platformModules: {
      macos: { files: ["prebuilds/darwin-*/**"] },
      windows: { files: ["prebuilds/win32-*/**"], hints: ["webview-nodejs/edge"] },
      linux: { files: ["prebuilds/linux-*/**"] },
    },
  },
  {
    name: "@huggingface/hub",
    required: false,
    acquisitionOrder: [{ strategy: "prebuilt", parameters: {} }],
  },
];

// ============================================================================
// Ordering and validation
// ============================================================================

const STRATEGY_RANK: Record<StrategyKind, number> = {
  prebuilt: 0,
  local: 0,
  source: 1,
};

/**
 * Order strategies so every source build comes after every prebuilt or local
 * install, keeping declaration order otherwise.
 */
export function orderStrategies(strategies: readonly AcquisitionStrategy[]): AcquisitionStrategy[] {
  return strategies
    .map((strategy, index) => ({ strategy, index }))
    .sort((a, b) =>
      STRATEGY_RANK[a.strategy.strategy] - STRATEGY_RANK[b.strategy.strategy] || a.index - b.index,
    )
    .map(({ strategy }) => strategy);
}

/**
 * Reject a dependency table the build cannot start with.
 */
export function validateDependencyTable(specs: readonly DependencySpec[]): void {
  const seen = new Set<string>();
  for (const spec of specs) {
    if (seen.has(spec.name)) {
      throw new ConfigurationError({
        summary: `dependency \`${spec.name}\` is declared twice`,
        help: "merge the two entries in package.json \"bundlesmith.dependencies\"",
      });
    }
    seen.add(spec.name);

    if (spec.required && spec.acquisitionOrder.length === 0) {
      throw new ConfigurationError({
        summary: `required dependency \`${spec.name}\` has no acquisition strategy`,
        help: "add at least one of \"prebuilt\", \"source\" or \"local\" to its acquisitionOrder",
      });
    }
  }
}
