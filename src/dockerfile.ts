/**
 * Container recipes for running the application headless: a CPU image on a
 * slim Node.js base, and a CUDA image that compiles the inference binding
 * against the GPU toolkit. Both expose the UI and API ports and check
 * liveness through the API's /health endpoint.
 */

import { posix } from "node:path";
import type { DependencySpec } from "./dependencies.js";
import type { SourceTree } from "./manifest.js";
import { describeAttempt, type DependencyResolver } from "./resolver.js";
import { createBuildTarget } from "./target.js";

export type DockerVariant = "cpu" | "cuda";

export const DOCKER_VARIANTS: readonly DockerVariant[] = ["cpu", "cuda"];

export function isDockerVariant(value: unknown): value is DockerVariant {
  return value === "cpu" || value === "cuda";
}

/** A shell step with the variables it needs exported first. */
export interface DockerBuildStep {
  env: Record<string, string>;
  command: string;
}

export interface DockerfileOptions {
  productName: string;
  /** Application entry point, relative to the project. */
  entry: string;
  sourceTrees: readonly SourceTree[];
  /** Compiles the native inference binding in the CUDA image. */
  inferenceBuild?: DockerBuildStep;
  uiPort?: number;
  apiPort?: number;
}

const NODE_IMAGE = "node:20-bookworm-slim";
const CUDA_IMAGE = "nvidia/cuda:12.1.1-devel-ubuntu22.04";

const BUILD_PACKAGES = ["build-essential", "cmake", "git", "curl"];

function aptInstall(packages: readonly string[]): string {
  return [
    "RUN apt-get update && apt-get install -y --no-install-recommends \\",
    ...packages.map((p) => `    ${p} \\`),
    "    && rm -rf /var/lib/apt/lists/*",
  ].join("\n");
}

/**
 * The source attempt `resolver` would run for `spec` on a Linux CUDA
 * target, installing into the image's /app.
 */
export function cudaBuildStep(spec: DependencySpec, resolver: DependencyResolver): DockerBuildStep | undefined {
  const target = createBuildTarget("linux", "x86_64", "cuda");
  const attempt = resolver.plan(spec, target, "/app").find((a) => a.strategy === "source");
  if (!attempt) return undefined;

  const env: Record<string, string> = {};
  for (const [name, value] of Object.entries(attempt.env)) {
    if (value !== undefined) env[name] = value;
  }
  return { env, command: describeAttempt(attempt) };
}

function runStep(step: DockerBuildStep): string {
  const exports = Object.entries(step.env).map(([name, value]) => `${name}=${JSON.stringify(value)}`);
  return exports.length > 0 ? `RUN export ${exports.join(" ")} && ${step.command}` : `RUN ${step.command}`;
}

function copySources(options: DockerfileOptions): string {
  const lines = options.sourceTrees.map((tree) => {
    const source = tree.path.replace(/\/+$/, "");
    const dest = tree.dest ?? source;
    return `COPY ${source}/ ./${posix.normalize(dest)}/`;
  });
  lines.push(`COPY ${options.entry} ./${options.entry}`);
  return lines.join("\n");
}

function runtimeTail(options: DockerfileOptions): string {
  const uiPort = options.uiPort ?? 7860;
  const apiPort = options.apiPort ?? 8000;
  return `EXPOSE ${uiPort} ${apiPort}

HEALTHCHECK --interval=30s --timeout=10s --start-period=5s --retries=3 \\
    CMD curl -f http://localhost:${apiPort}/health || exit 1

CMD ["node", "${options.entry}", "--api", "--port", "${apiPort}"]
`;
}

export function renderDockerfile(variant: DockerVariant, options: DockerfileOptions): string {
  const header = `# ${options.productName} (${variant === "cpu" ? "CPU" : "CUDA"} image)`;

  if (variant === "cpu") {
    return `${header}
FROM ${NODE_IMAGE}

ENV NODE_ENV=production \\
    NPM_CONFIG_UPDATE_NOTIFIER=false

WORKDIR /app

${aptInstall(BUILD_PACKAGES)}

COPY package*.json ./
RUN npm install --omit=dev --no-audit --no-fund

${copySources(options)}

${runtimeTail(options)}`;
  }

  const build = options.inferenceBuild ? `\n${runStep(options.inferenceBuild)}` : "";
  return `${header}
FROM ${NODE_IMAGE} AS node

FROM ${CUDA_IMAGE}

ENV NODE_ENV=production \\
    NPM_CONFIG_UPDATE_NOTIFIER=false \\
    DEBIAN_FRONTEND=noninteractive

COPY --from=node /usr/local/bin/node /usr/local/bin/node
COPY --from=node /usr/local/lib/node_modules /usr/local/lib/node_modules
RUN ln -s /usr/local/lib/node_modules/npm/bin/npm-cli.js /usr/local/bin/npm

WORKDIR /app

${aptInstall(["python3", ...BUILD_PACKAGES])}

COPY package*.json ./
RUN npm install --omit=dev --no-audit --no-fund${build}

${copySources(options)}

${runtimeTail(options)}`;
}
