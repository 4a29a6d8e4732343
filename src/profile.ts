/**
 * Platform profile resolution: derive the `BuildTarget` for this build from
 * the host (or from explicit overrides).
 *
 * Resolution never throws for an unsupported host. Acceleration combinations
 * that cannot exist degrade to CPU-only with a warning; a host with no
 * packaging procedure yields an unsupported profile, which the orchestrator
 * turns into `ProfileUnsupported` when it looks for a packager.
 */

import { BuildInterruptedError, ProfileUnsupportedError } from "./errors.js";
import type { CommandRunner } from "./process.js";
import {
  createBuildTarget,
  type Acceleration,
  type AccelerationRequest,
  type BuildTarget,
  type CpuArch,
  type OsFamily,
} from "./target.js";

// ============================================================================
// Types
// ============================================================================

/** The host as Node.js reports it. */
export interface HostInfo {
  platform: string;
  arch: string;
}

/** Returns true when a CUDA-capable runtime is present. May throw. */
export type AccelerationProbe = (host: HostInfo) => Promise<boolean>;

export interface ProfileOptions {
  /** Defaults to `process.platform` / `process.arch`. */
  host?: HostInfo;
  /** Build for this OS family instead of the host's. */
  os?: OsFamily;
  /** Build for this architecture instead of the host's. */
  arch?: CpuArch;
  /** Defaults to `auto`. */
  gpu?: AccelerationRequest;
  /** Required for `auto` on Linux and Windows hosts; absent means no GPU. */
  probe?: AccelerationProbe;
}

export interface SupportedProfile {
  supported: true;
  target: BuildTarget;
  warnings: string[];
}

export interface UnsupportedProfile {
  supported: false;
  platform: string;
  arch: string;
  reason: string;
  warnings: string[];
}

export type PlatformProfile = SupportedProfile | UnsupportedProfile;

// ============================================================================
// Host mapping
// ============================================================================

export function osFamilyOf(platform: string): OsFamily | null {
  switch (platform) {
    case "darwin":
      return "macos";
    case "win32":
      return "windows";
    case "linux":
      return "linux";
    default:
      return null;
  }
}

export function cpuArchOf(arch: string): CpuArch | null {
  switch (arch) {
    case "x64":
      return "x86_64";
    case "arm64":
      return "arm64";
    default:
      return null;
  }
}

// ============================================================================
// Acceleration policy
// ============================================================================

/**
 * Drop acceleration requests the target cannot honor: Metal exists only on
 * Apple silicon, CUDA never on macOS.
 */
function reconcileAcceleration(
  os: OsFamily,
  arch: CpuArch,
  requested: Acceleration,
  warnings: string[],
): Acceleration {
  if (requested === "metal" && !(os === "macos" && arch === "arm64")) {
    warnings.push(`Metal acceleration is only available on macOS arm64; building ${os}-${arch} CPU-only`);
    return "none";
  }
  if (requested === "cuda" && os === "macos") {
    warnings.push("CUDA acceleration is not available on macOS; building CPU-only");
    return "none";
  }
  return requested;
}

async function detectAcceleration(
  os: OsFamily,
  arch: CpuArch,
  host: HostInfo,
  crossTarget: boolean,
  probe: AccelerationProbe | undefined,
  warnings: string[],
): Promise<Acceleration> {
  if (os === "macos") {
    return arch === "arm64" ? "metal" : "none";
  }

  // The probe inspects this machine, which says nothing about another target
  if (crossTarget || !probe) {
    return "none";
  }

  try {
    return (await probe(host)) ? "cuda" : "none";
  } catch (error) {
    if (error instanceof BuildInterruptedError) throw error;
    const message = error instanceof Error ? error.message : String(error);
    warnings.push(`GPU probe failed (${message}); building CPU-only`);
    return "none";
  }
}

// ============================================================================
// Resolution
// ============================================================================

export async function resolvePlatformProfile(options: ProfileOptions = {}): Promise<PlatformProfile> {
  const host = options.host ?? { platform: process.platform, arch: process.arch };
  const warnings: string[] = [];

  const os = options.os ?? osFamilyOf(host.platform);
  const arch = options.arch ?? cpuArchOf(host.arch);

  if (!os) {
    return {
      supported: false,
      platform: host.platform,
      arch: host.arch,
      reason: `host platform '${host.platform}' has no packaging procedure`,
      warnings,
    };
  }
  if (!arch) {
    return {
      supported: false,
      platform: host.platform,
      arch: host.arch,
      reason: `host architecture '${host.arch}' is not supported (expected x64 or arm64)`,
      warnings,
    };
  }

  const crossTarget = os !== osFamilyOf(host.platform) || arch !== cpuArchOf(host.arch);
  const requested = options.gpu ?? "auto";

  const acceleration = requested === "auto"
    ? await detectAcceleration(os, arch, host, crossTarget, options.probe, warnings)
    : reconcileAcceleration(os, arch, requested, warnings);

  return {
    supported: true,
    target: createBuildTarget(os, arch, acceleration),
    warnings,
  };
}

/**
 * The target of a supported profile.
 *
 * @throws ProfileUnsupportedError for an unsupported one
 */
export function requireSupportedTarget(profile: PlatformProfile): BuildTarget {
  if (!profile.supported) {
    throw new ProfileUnsupportedError({ platform: profile.platform, arch: profile.arch, reason: profile.reason });
  }
  return profile.target;
}

// ============================================================================
// CUDA probe
// ============================================================================

/** Where NVIDIA drivers install nvidia-smi on Windows when it is not on PATH. */
const WINDOWS_NVIDIA_SMI_PATHS = [
  "C:\\Windows\\System32\\nvidia-smi.exe",
  "C:\\Program Files\\NVIDIA Corporation\\NVSMI\\nvidia-smi.exe",
];

/**
 * Probe for a CUDA runtime by asking nvidia-smi for the GPU name.
 */
export function createCudaProbe(
  runner: CommandRunner,
  options: { signal?: AbortSignal } = {},
): AccelerationProbe {
  return async (host) => {
    const candidates = host.platform === "win32"
      ? ["nvidia-smi", ...WINDOWS_NVIDIA_SMI_PATHS]
      : ["nvidia-smi"];

    for (const candidate of candidates) {
      const result = await runner.run(
        candidate,
        ["--query-gpu=name", "--format=csv,noheader"],
        { signal: options.signal },
      );
      if (result.exitCode === 0 && result.stdout.trim() !== "") {
        return true;
      }
    }
    return false;
  };
}
