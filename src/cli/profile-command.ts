/**
 * `bundlesmith profile`: resolve and print the build target without building.
 */

import { formatDiagnostic } from "../errors.js";
import { createCudaProbe, requireSupportedTarget, resolvePlatformProfile, type HostInfo } from "../profile.js";
import { ProcessRunner, type CommandRunner } from "../process.js";
import { describeTarget, targetKey, type BuildTarget } from "../target.js";
import { cyan, cyanBold, dim, greenBold, whiteBold, yellow } from "./fmt.js";
import { parseTargetFlag, type TargetFlags } from "./build-command.js";

export interface ProfileCommandOptions extends TargetFlags {
  json: boolean;
}

export function parseProfileArgs(args: string[]): ProfileCommandOptions {
  const options: ProfileCommandOptions = { json: false };
  let i = 0;
  while (i < args.length) {
    const used = parseTargetFlag(args, i, options);
    if (used > 0) {
      i += used;
      continue;
    }
    const arg = args[i];
    if (arg === "--json") {
      options.json = true;
    } else {
      throw new Error(`Unknown option: ${arg}`);
    }
    i++;
  }
  return options;
}

export async function runProfile(
  options: ProfileCommandOptions,
  dependencies: { runner?: CommandRunner; host?: HostInfo } = {},
): Promise<number> {
  const profile = await resolvePlatformProfile({
    ...(dependencies.host ? { host: dependencies.host } : {}),
    ...(options.os ? { os: options.os } : {}),
    ...(options.arch ? { arch: options.arch } : {}),
    ...(options.gpu ? { gpu: options.gpu } : {}),
    probe: createCudaProbe(dependencies.runner ?? new ProcessRunner()),
  });

  let target: BuildTarget;
  try {
    target = requireSupportedTarget(profile);
  } catch (error) {
    console.error(formatDiagnostic(error, { color: process.stderr.isTTY === true }));
    return 1;
  }

  if (options.json) {
    console.log(JSON.stringify({ ...target, key: targetKey(target), warnings: profile.warnings }, null, 2));
    return 0;
  }

  console.log(`${describeTarget(target)} ${dim(`(${targetKey(target)})`)}`);
  for (const warning of profile.warnings) {
    console.log(`${yellow("warning:")} ${warning}`);
  }
  return 0;
}

export function showProfileHelp(): void {
  console.log(`
${cyanBold("bundlesmith profile")} - ${whiteBold("Show the build target for this machine")}

${greenBold("Usage:")}
  ${cyanBold("bundlesmith profile")} ${cyan("[options]")}

${greenBold("Options:")}
  ${cyan("--os")} ${dim("<os>")}              Target OS: macos, windows, linux ${dim("(default: host)")}
  ${cyan("--arch")} ${dim("<arch>")}          Target architecture: x86_64, arm64 ${dim("(default: host)")}
  ${cyan("--gpu")} ${dim("<accel>")}          Acceleration: auto, none, metal, cuda ${dim("(default: auto)")}
  ${cyan("--json")}                 Print the target as JSON
  ${cyan("-h, --help")}             Show this help message
`.trim() + "\n");
}
