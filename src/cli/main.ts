#!/usr/bin/env node
/**
 * bundlesmith CLI entry point.
 */

import { readFileSync } from "node:fs";
import { BundlesmithError, formatDiagnostic } from "../errors.js";
import { parseBuildArgs, runBuild, showBuildHelp } from "./build-command.js";
import { fmtError, hasHelpFlag, showMainHelp } from "./commands.js";
import { parseDockerfileArgs, runDockerfile, showDockerfileHelp } from "./dockerfile-command.js";
import { parseProfileArgs, runProfile, showProfileHelp } from "./profile-command.js";

// Two levels up from both src/cli and dist/cli
function readVersion(): string {
  const pkg: unknown = JSON.parse(readFileSync(new URL("../../package.json", import.meta.url), "utf-8"));
  if (typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string") {
    return pkg.version;
  }
  return "unknown";
}

async function dispatch(args: string[]): Promise<number> {
  const [command, ...rest] = args;

  switch (command) {
    case "build":
      if (hasHelpFlag(rest)) {
        showBuildHelp();
        return 0;
      }
      return runBuild(parseBuildArgs(rest));

    case "profile":
      if (hasHelpFlag(rest)) {
        showProfileHelp();
        return 0;
      }
      return runProfile(parseProfileArgs(rest));

    case "dockerfile":
      if (hasHelpFlag(rest)) {
        showDockerfileHelp();
        return 0;
      }
      return runDockerfile(parseDockerfileArgs(rest));

    case undefined:
    case "--help":
    case "-h":
      showMainHelp();
      return 0;

    case "--version":
    case "-V":
      console.log(`bundlesmith ${readVersion()}`);
      return 0;

    default:
      console.error(fmtError(`Unknown command: ${command}`));
      console.error("");
      showMainHelp();
      return 1;
  }
}

async function main(): Promise<void> {
  try {
    process.exitCode = await dispatch(process.argv.slice(2));
  } catch (error) {
    if (error instanceof BundlesmithError) {
      console.error(formatDiagnostic(error, { color: process.stderr.isTTY === true }));
    } else {
      console.error(fmtError(error instanceof Error ? error.message : String(error)));
    }
    if (process.env.DEBUG && error instanceof Error) {
      console.error(error.stack);
    }
    process.exitCode = 1;
  }
}

await main();
