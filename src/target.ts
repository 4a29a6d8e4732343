/**
 * Build target model shared by every stage of the pipeline.
 *
 * A `BuildTarget` is resolved once per build invocation and frozen; its key
 * (`<os>-<arch>-<acceleration>`) names the environment, lock and output
 * directories that belong to that target.
 */

// ============================================================================
// Types
// ============================================================================

/** Operating system families that have a packaging procedure. */
export type OsFamily = "macos" | "windows" | "linux";

/** CPU architectures the self-contained executable can be compiled for. */
export type CpuArch = "x86_64" | "arm64";

/** Hardware-acceleration backend the inference binding is built against. */
export type Acceleration = "none" | "metal" | "cuda";

/** Requested acceleration, where `auto` asks the profile resolver to decide. */
export type AccelerationRequest = Acceleration | "auto";

export interface BuildTarget {
  readonly os: OsFamily;
  readonly arch: CpuArch;
  readonly acceleration: Acceleration;
}

export const OS_FAMILIES: readonly OsFamily[] = ["macos", "windows", "linux"];
export const CPU_ARCHES: readonly CpuArch[] = ["x86_64", "arm64"];
export const ACCELERATIONS: readonly Acceleration[] = ["none", "metal", "cuda"];

// ============================================================================
// Construction and guards
// ============================================================================

export function createBuildTarget(
  os: OsFamily,
  arch: CpuArch,
  acceleration: Acceleration,
): BuildTarget {
  return Object.freeze({ os, arch, acceleration });
}

export function isOsFamily(value: unknown): value is OsFamily {
  return OS_FAMILIES.some((os) => os === value);
}

export function isCpuArch(value: unknown): value is CpuArch {
  return CPU_ARCHES.some((arch) => arch === value);
}

export function isAcceleration(value: unknown): value is Acceleration {
  return ACCELERATIONS.some((acceleration) => acceleration === value);
}

export function isAccelerationRequest(value: unknown): value is AccelerationRequest {
  return value === "auto" || isAcceleration(value);
}

/**
 * Stable identifier for a target, e.g. `linux-x86_64-none`.
 */
export function targetKey(target: BuildTarget): string {
  return `${target.os}-${target.arch}-${target.acceleration}`;
}

/**
 * Human-readable description, e.g. `macOS arm64 (metal)`.
 */
export function describeTarget(target: BuildTarget): string {
  const osLabel: Record<OsFamily, string> = {
    macos: "macOS",
    windows: "Windows",
    linux: "Linux",
  };
  const accel = target.acceleration === "none" ? "CPU only" : target.acceleration;
  return `${osLabel[target.os]} ${target.arch} (${accel})`;
}

// ============================================================================
// Node.js naming
// ============================================================================

/** Map an OS family to the `process.platform` value of a host running it. */
export function nodePlatformOf(os: OsFamily): NodeJS.Platform {
  switch (os) {
    case "macos":
      return "darwin";
    case "windows":
      return "win32";
    case "linux":
      return "linux";
  }
}

/** Map an architecture to the `process.arch` naming. */
export function nodeArchOf(arch: CpuArch): "x64" | "arm64" {
  return arch === "x86_64" ? "x64" : "arm64";
}
