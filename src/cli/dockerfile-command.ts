/**
 * `bundlesmith dockerfile`: print a container recipe for the project.
 */

import { resolve } from "node:path";
import { loadProjectConfig } from "../config.js";
import { cudaBuildStep, isDockerVariant, renderDockerfile, type DockerBuildStep, type DockerVariant } from "../dockerfile.js";
import { ProcessRunner } from "../process.js";
import { DependencyResolver } from "../resolver.js";
import { cyan, cyanBold, dim, greenBold, whiteBold } from "./fmt.js";
import { takeValue } from "./commands.js";

export interface DockerfileCommandOptions {
  variant: DockerVariant;
  project?: string;
}

export function parseDockerfileArgs(args: string[]): DockerfileCommandOptions {
  const options: DockerfileCommandOptions = { variant: "cpu" };
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === "--variant") {
      const value = takeValue(args, i, arg);
      if (!isDockerVariant(value)) {
        throw new Error(`Invalid --variant '${value}'. Valid values: cpu, cuda`);
      }
      options.variant = value;
      i++;
    } else if (arg === "--project") {
      options.project = takeValue(args, i, arg);
      i++;
    } else {
      throw new Error(`Unknown option: ${arg}`);
    }
  }
  return options;
}

export function runDockerfile(options: DockerfileCommandOptions, cwd: string = process.cwd()): number {
  const config = loadProjectConfig(resolve(cwd, options.project ?? "."));
  let inferenceBuild: DockerBuildStep | undefined;
  if (options.variant === "cuda") {
    // Planned for the image, not the host: Linux paths and no inherited environment
    const resolver = new DependencyResolver({ runner: new ProcessRunner(), platform: "linux", baseEnv: {} });
    const binding = config.dependencies.find((d) => d.acquisitionOrder.some((s) => s.strategy === "source"));
    inferenceBuild = binding ? cudaBuildStep(binding, resolver) : undefined;
  }
  process.stdout.write(
    renderDockerfile(options.variant, {
      productName: config.productName,
      entry: config.entry,
      sourceTrees: config.sourceTrees,
      ...(inferenceBuild ? { inferenceBuild } : {}),
    }),
  );
  return 0;
}

export function showDockerfileHelp(): void {
  console.log(`
${cyanBold("bundlesmith dockerfile")} - ${whiteBold("Print a container recipe for headless deployment")}

${greenBold("Usage:")}
  ${cyanBold("bundlesmith dockerfile")} ${cyan("[options]")} ${dim("> Dockerfile")}

${greenBold("Options:")}
  ${cyan("--variant")} ${dim("<variant>")}    cpu or cuda ${dim("(default: cpu)")}
  ${cyan("--project")} ${dim("<dir>")}        Application directory ${dim("(default: .)")}
  ${cyan("-h, --help")}             Show this help message
`.trim() + "\n");
}
