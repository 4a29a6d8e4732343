/**
 * In-process stand-ins for the tools the pipeline shells out to, and
 * helpers for building throwaway projects on disk.
 *
 * `FakeRunner` records every command and answers it from registered
 * handlers; `npmInstaller` simulates `npm install --prefix` by writing the
 * requested packages into `node_modules`. `FakeCompiler` writes a stub
 * executable where pkg would.
 */

import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";
import fg from "fast-glob";
import { BuildInterruptedError } from "./errors.js";
import type { CompileRequest, ExecutableCompiler } from "./packager/compiler.js";
import { formatCommand, type CommandResult, type CommandRunner, type RunOptions } from "./process.js";
import type { Reporter } from "./reporter.js";

// ============================================================================
// Command runner
// ============================================================================

export interface RecordedCall {
  command: string;
  args: string[];
  options: RunOptions;
}

export type CommandHandler = (call: RecordedCall) => CommandResult | Promise<CommandResult>;

export function ok(stdout = ""): CommandResult {
  return { exitCode: 0, stdout, stderr: "" };
}

export function failed(stderr: string, exitCode = 1): CommandResult {
  return { exitCode, stdout: "", stderr };
}

export class FakeRunner implements CommandRunner {
  readonly calls: RecordedCall[] = [];
  private readonly handlers: Array<{ command: string; handler: CommandHandler }> = [];

  /** Answer `command` (matched without a `.cmd` suffix) with `handler`; later registrations win. */
  on(command: string, handler: CommandHandler): this {
    this.handlers.unshift({ command, handler });
    return this;
  }

  async run(command: string, args: string[], options: RunOptions = {}): Promise<CommandResult> {
    if (options.signal?.aborted) {
      throw new BuildInterruptedError({ command: formatCommand(command, args) });
    }
    const call: RecordedCall = { command, args, options };
    this.calls.push(call);
    const name = command.replace(/\.cmd$/, "");
    const match = this.handlers.find((h) => h.command === name);
    return match ? match.handler(call) : ok();
  }

  /** Calls to `command`, in order. */
  callsTo(command: string): RecordedCall[] {
    return this.calls.filter((c) => c.command.replace(/\.cmd$/, "") === command);
  }
}

// ============================================================================
// Simulated npm
// ============================================================================

export interface FakePackage {
  version: string;
  /** Files relative to the package directory, with their contents. */
  files?: Record<string, string>;
}

/** Packages named on an `npm install` command line, without version ranges. */
export function requestedPackages(args: string[]): string[] {
  const names: string[] = [];
  for (let i = 1; i < args.length; i++) {
    const arg = args[i];
    if (arg === "--prefix" || arg === "--registry") {
      i++;
      continue;
    }
    if (arg.startsWith("-")) continue;
    const at = arg.lastIndexOf("@");
    names.push(at > 0 ? arg.slice(0, at) : arg);
  }
  return names;
}

export function prefixOf(args: string[]): string {
  const index = args.indexOf("--prefix");
  return index >= 0 ? args[index + 1] : "";
}

/** Write `node_modules/<name>` under `prefix` as npm would. */
export function installFakePackage(prefix: string, name: string, pkg: FakePackage): void {
  const dir = join(prefix, "node_modules", ...name.split("/"));
  writeFiles(dir, {
    "package.json": JSON.stringify({ name, version: pkg.version }),
    ...pkg.files,
  });
}

/**
 * An npm handler that installs every requested package found in `registry`
 * and fails when one is unknown. `--version` and `exec` always succeed.
 */
export function npmInstaller(registry: Record<string, FakePackage>): CommandHandler {
  return ({ args }) => {
    if (args[0] === "--version") return ok("10.8.2\n");
    if (args[0] === "exec") return ok();
    if (args[0] !== "install") return failed(`unknown command ${args[0]}`);

    const prefix = prefixOf(args);
    const requested = requestedPackages(args);
    const unknown = requested.filter((name) => !(name in registry));
    if (unknown.length > 0) {
      return failed(`npm ERR! 404 Not Found - GET https://registry.npmjs.org/${unknown[0]}`);
    }
    for (const name of requested) {
      installFakePackage(prefix, name, registry[name]);
    }
    return ok(`added ${requested.length} packages`);
  };
}

// ============================================================================
// Compiler
// ============================================================================

export class FakeCompiler implements ExecutableCompiler {
  readonly requests: CompileRequest[] = [];
  /** Payload contents at compile time, per request. */
  readonly payloads: string[][] = [];

  async compile(request: CompileRequest): Promise<void> {
    this.requests.push(request);
    this.payloads.push(fg.sync("**/*", { cwd: request.payloadDir, dot: true, onlyFiles: true }).sort());
    mkdirSync(dirname(request.output), { recursive: true });
    writeFileSync(request.output, "#!fake executable\n");
  }
}

// ============================================================================
// Reporter
// ============================================================================

export interface RecordingReporter extends Reporter {
  infos: string[];
  warnings: string[];
  debugs: string[];
}

export function recordingReporter(): RecordingReporter {
  const infos: string[] = [];
  const warnings: string[] = [];
  const debugs: string[] = [];
  return {
    infos,
    warnings,
    debugs,
    info: (message) => infos.push(message),
    warn: (message) => warnings.push(message),
    debug: (message) => debugs.push(message),
  };
}

// ============================================================================
// Files
// ============================================================================

export function makeTempDir(prefix: string): string {
  return mkdtempSync(join(tmpdir(), `bundlesmith-${prefix}-`));
}

export function cleanup(dir: string): void {
  rmSync(dir, { recursive: true, force: true });
}

/** Write `files` (forward-slash paths relative to `root`). */
export function writeFiles(root: string, files: Record<string, string>): void {
  for (const [path, contents] of Object.entries(files)) {
    const destination = join(root, ...path.split("/"));
    mkdirSync(dirname(destination), { recursive: true });
    writeFileSync(destination, contents);
  }
}

/**
 * A desktop application project: the server entry, one more module, and a
 * package.json with `bundlesmith` settings.
 */
export function writeSampleProject(root: string, bundlesmith: Record<string, unknown> = {}): void {
  writeFiles(root, {
    "package.json": JSON.stringify(
      {
        name: "localllm-studio",
        productName: "LocalLLM Studio",
        version: "1.2.0",
        description: "Chat with local models",
        main: "server/main.js",
        bundlesmith: { sourceTrees: ["server"], ...bundlesmith },
      },
      null,
      2,
    ),
    "server/main.js": "import './routes.js';\n",
    "server/routes.js": "export const routes = [];\n",
  });
}

/** Packages for the default dependency table, with one native binary per OS. */
export const SAMPLE_REGISTRY: Record<string, FakePackage> = {
  "node-llama-cpp": {
    version: "3.1.0",
    files: {
      "dist/index.js": "module.exports = {};\n",
      "bins/addon/llama-addon.node": "native",
    },
  },
  "webview-nodejs": {
    version: "0.4.2",
    files: {
      "index.js": "module.exports = {};\n",
      "prebuilds/darwin-arm64/webview.node": "native",
      "prebuilds/linux-x64/webview.node": "native",
      "prebuilds/win32-x64/webview.node": "native",
    },
  },
  "@huggingface/hub": {
    version: "0.15.1",
    files: { "dist/index.js": "module.exports = {};\n" },
  },
};
