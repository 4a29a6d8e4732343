/**
 * Self-contained executable compilation.
 *
 * Two stages:
 *
 * 1. **Bundle the entry with esbuild** into a CommonJS launcher at the root
 *    of the staged payload. Packages with native binaries stay external and
 *    are resolved from the payload's `node_modules` at runtime.
 * 2. **Compile with pkg**: the launcher plus the payload (as assets) become a
 *    single binary with an embedded Node.js runtime.
 */

import { writeFileSync } from "node:fs";
import { join } from "node:path";
import * as esbuild from "esbuild";
import { nodeArchOf, type BuildTarget, type OsFamily } from "../target.js";

export interface CompileRequest {
  payloadDir: string;
  /** Bundle path of the entry inside the payload, e.g. `app/server/main.js`. */
  entry: string;
  /** Module specifiers to leave unbundled. */
  externals: string[];
  target: BuildTarget;
  /** Where the executable is written. */
  output: string;
  appId: string;
  version: string;
}

export interface ExecutableCompiler {
  compile(request: CompileRequest): Promise<void>;
}

const PKG_PLATFORM: Record<OsFamily, string> = {
  macos: "macos",
  windows: "win",
  linux: "linux",
};

/** pkg target triple, e.g. `node20-linux-x64`. */
export function pkgTarget(target: BuildTarget): string {
  return `node20-${PKG_PLATFORM[target.os]}-${nodeArchOf(target.arch)}`;
}

export class PkgCompiler implements ExecutableCompiler {
  async compile(request: CompileRequest): Promise<void> {
    const launcher = join(request.payloadDir, "launcher.cjs");

    await esbuild.build({
      entryPoints: [join(request.payloadDir, ...request.entry.split("/"))],
      bundle: true,
      platform: "node",
      format: "cjs",
      target: "node20",
      outfile: launcher,
      external: ["node:*", "*.node", ...request.externals],
      logLevel: "silent",
    });

    // pkg resolves assets relative to the config file
    const config = join(request.payloadDir, "package.json");
    writeFileSync(
      config,
      JSON.stringify(
        {
          name: request.appId,
          version: request.version,
          bin: "launcher.cjs",
          pkg: { assets: ["app/**/*", "node_modules/**/*"] },
        },
        null,
        2,
      ),
    );

    const { exec } = await import("@yao-pkg/pkg");
    await exec([
      launcher,
      "--targets",
      pkgTarget(request.target),
      "--output",
      request.output,
      "--config",
      config,
      "--public", // Include source instead of bytecode (required for cross-compilation)
    ]);
  }
}
