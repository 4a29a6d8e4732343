import { describe, it, beforeEach, afterEach } from "node:test";
import assert from "node:assert";
import { join } from "node:path";
import type { DependencySpec } from "./dependencies.js";
import type { InstalledEnvironment } from "./environment.js";
import { ConfigurationError, ManifestConflictError, ManifestIncompleteError } from "./errors.js";
import {
  BundleManifestBuilder,
  DEFAULT_EXCLUSIONS,
  manifestSize,
  parseExclusionRule,
  type ExclusionRule,
} from "./manifest.js";
import { createBuildTarget, type BuildTarget } from "./target.js";
import { cleanup, installFakePackage, makeTempDir, writeFiles } from "./test-harness.js";

const LINUX = createBuildTarget("linux", "x86_64", "none");
const WINDOWS = createBuildTarget("windows", "x86_64", "none");

const WEBVIEW: DependencySpec = {
  name: "webview-nodejs",
  required: true,
  acquisitionOrder: [{ strategy: "prebuilt", parameters: {} }],
  platformModules: {
    macos: { files: ["prebuilds/darwin-*/**"] },
    windows: { files: ["prebuilds/win32-*/**"], hints: ["webview-nodejs/edge"] },
    linux: { files: ["prebuilds/linux-*/**"] },
  },
};

const LLAMA: DependencySpec = {
  name: "node-llama-cpp",
  required: true,
  acquisitionOrder: [{ strategy: "prebuilt", parameters: {} }],
  runtimeData: ["llama/**/*.metal"],
  moduleHints: ["node-llama-cpp/addon"],
};

describe("BundleManifestBuilder", () => {
  let projectDir: string;
  let env: InstalledEnvironment;

  beforeEach(() => {
    projectDir = makeTempDir("manifest");
    writeFiles(projectDir, {
      "server/main.js": "main",
      "server/routes.js": "routes",
      "server/test/routes.test.js": "test",
      "server/main.js.map": "map",
      "ui/dist/index.html": "<html></html>",
    });

    const root = join(projectDir, "build", "env", "linux-x86_64-none");
    installFakePackage(root, "webview-nodejs", {
      version: "0.4.2",
      files: {
        "index.js": "js",
        "prebuilds/darwin-arm64/webview.node": "native",
        "prebuilds/linux-x64/webview.node": "native",
        "prebuilds/linux-x64/libQt5Core.so.5": "qt",
        "prebuilds/win32-x64/webview.node": "native",
      },
    });
    installFakePackage(root, "node-llama-cpp", {
      version: "3.1.0",
      files: {
        "dist/index.js": "js",
        "bins/addon/llama-addon.node": "native",
        "llama/ggml-metal.metal": "shader",
      },
    });
    env = {
      root,
      scope: "linux-x86_64-none",
      installed: [
        { name: "webview-nodejs", version: "0.4.2", strategy: "prebuilt", directory: join(root, "node_modules", "webview-nodejs") },
        { name: "node-llama-cpp", version: "3.1.0", strategy: "prebuilt", directory: join(root, "node_modules", "node-llama-cpp") },
      ],
    };
  });

  afterEach(() => {
    cleanup(projectDir);
  });

  function builder(
    target: BuildTarget = LINUX,
    options: { exclusions?: ExclusionRule[]; requiredFiles?: string[] } = {},
  ): BundleManifestBuilder {
    return new BundleManifestBuilder({
      projectDir,
      target,
      entry: "server/main.js",
      dependencies: [WEBVIEW, LLAMA],
      ...options,
    });
  }

  it("collects source trees under app/ and packages under node_modules/", () => {
    const manifest = builder().build(env, [{ path: "server" }, { path: "ui/dist", dest: "ui" }]);

    assert.strictEqual(manifest.entry, "app/server/main.js");
    assert.deepStrictEqual(manifest.regularFiles.map((f) => f.dest), [
      "app/server/main.js",
      "app/server/routes.js",
      "app/ui/index.html",
      "node_modules/node-llama-cpp/dist/index.js",
      "node_modules/node-llama-cpp/package.json",
      "node_modules/webview-nodejs/index.js",
      "node_modules/webview-nodejs/package.json",
    ]);
    assert.deepStrictEqual(
      manifest.nativeBinaries.map((f) => [f.dest, f.origin]),
      [
        ["node_modules/node-llama-cpp/bins/addon/llama-addon.node", "node-llama-cpp"],
        ["node_modules/node-llama-cpp/llama/ggml-metal.metal", "node-llama-cpp"],
        ["node_modules/webview-nodejs/prebuilds/linux-x64/webview.node", "webview-nodejs"],
      ],
    );
    assert.strictEqual(manifestSize(manifest), 10);
    assert.deepStrictEqual(manifest.moduleHints, ["node-llama-cpp/addon"]);
    assert.strictEqual(
      manifest.regularFiles[0].source,
      join(projectDir, "server", "main.js"),
    );
  });

  it("records what platform filtering and exclusion removed", () => {
    const manifest = builder().build(env, [{ path: "server" }]);
    assert.deepStrictEqual(manifest.excluded, [
      { dest: "app/server/main.js.map", rule: "glob:**/*.map" },
      { dest: "app/server/test/routes.test.js", rule: "glob:**/test/**" },
      { dest: "node_modules/webview-nodejs/prebuilds/darwin-arm64/webview.node", rule: "platform:macos" },
      { dest: "node_modules/webview-nodejs/prebuilds/linux-x64/libQt5Core.so.5", rule: "prefix:libQt" },
      { dest: "node_modules/webview-nodejs/prebuilds/win32-x64/webview.node", rule: "platform:windows" },
    ]);
    assert.deepStrictEqual(manifest.excludedPatterns, [...DEFAULT_EXCLUSIONS]);
  });

  it("keeps the other platform's backend and hints for a Windows target", () => {
    const manifest = builder(WINDOWS).build(env, [{ path: "server" }]);
    const natives = manifest.nativeBinaries.map((f) => f.dest);
    assert.ok(natives.includes("node_modules/webview-nodejs/prebuilds/win32-x64/webview.node"));
    assert.ok(!natives.includes("node_modules/webview-nodejs/prebuilds/linux-x64/webview.node"));
    assert.deepStrictEqual(manifest.moduleHints, ["node-llama-cpp/addon", "webview-nodejs/edge"]);
  });

  it("matches substring rules case-insensitively against the bundle path", () => {
    const manifest = builder(LINUX, { exclusions: [{ kind: "substring", pattern: "ROUTES" }] })
      .build(env, [{ path: "server" }]);
    assert.deepStrictEqual(
      manifest.excluded.filter((e) => e.rule === "substring:ROUTES").map((e) => e.dest),
      ["app/server/routes.js", "app/server/test/routes.test.js"],
    );
  });

  it("fails when a rule removes the entry point", () => {
    assert.throws(
      () => builder(LINUX, { exclusions: [{ kind: "substring", pattern: "main" }] }).build(env, [{ path: "server" }]),
      (error: unknown) => {
        assert.ok(error instanceof ManifestIncompleteError);
        assert.deepStrictEqual(error.missing, [{ dest: "app/server/main.js", removedBy: "substring:main" }]);
        return true;
      },
    );
  });

  it("fails when a required file was never collected", () => {
    assert.throws(
      () => builder(LINUX, { requiredFiles: ["app/server/config.json"] }).build(env, [{ path: "server" }]),
      (error: unknown) => {
        assert.ok(error instanceof ManifestIncompleteError);
        assert.deepStrictEqual(error.missing, [{ dest: "app/server/config.json" }]);
        return true;
      },
    );
  });

  it("fails when every native binary of a required dependency is excluded", () => {
    const exclusions: ExclusionRule[] = [{ kind: "glob", pattern: "bins/**" }, { kind: "glob", pattern: "llama/**" }];
    assert.throws(
      () => builder(LINUX, { exclusions }).build(env, [{ path: "server" }]),
      (error: unknown) => {
        assert.ok(error instanceof ManifestIncompleteError);
        assert.deepStrictEqual(error.missing, [
          { dest: "node_modules/node-llama-cpp/bins/addon/llama-addon.node", removedBy: "glob:bins/**" },
        ]);
        return true;
      },
    );
  });

  it("rejects two files mapped to the same bundle path", () => {
    writeFiles(projectDir, { "extra/routes.js": "other routes" });
    assert.throws(
      () => builder().build(env, [{ path: "server" }, { path: "extra", dest: "server" }]),
      (error: unknown) => error instanceof ManifestConflictError && error.dest === "app/server/routes.js",
    );
  });

  it("rejects a source tree that is not a directory", () => {
    assert.throws(
      () => builder().build(env, [{ path: "missing" }]),
      (error: unknown) => error instanceof ConfigurationError && error.summary === "source tree missing is not a directory",
    );
  });
});

describe("parseExclusionRule", () => {
  it("reads kind:pattern", () => {
    assert.deepStrictEqual(parseExclusionRule("substring:benchmark"), { kind: "substring", pattern: "benchmark" });
    assert.deepStrictEqual(parseExclusionRule("prefix:libQt"), { kind: "prefix", pattern: "libQt" });
  });

  it("treats anything else as a glob", () => {
    assert.deepStrictEqual(parseExclusionRule("**/docs/**"), { kind: "glob", pattern: "**/docs/**" });
    assert.deepStrictEqual(parseExclusionRule("c:/weird"), { kind: "glob", pattern: "c:/weird" });
  });
});
