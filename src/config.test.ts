import { describe, it, beforeEach, afterEach } from "node:test";
import assert from "node:assert";
import { join } from "node:path";
import { loadProjectConfig, mergeDependencies, slugify } from "./config.js";
import { DEFAULT_DEPENDENCIES, type DependencySpec } from "./dependencies.js";
import { ConfigurationError } from "./errors.js";
import { DEFAULT_EXCLUSIONS } from "./manifest.js";
import { cleanup, makeTempDir, writeFiles } from "./test-harness.js";

function writePackageJson(dir: string, pkg: Record<string, unknown>): void {
  writeFiles(dir, { "package.json": JSON.stringify(pkg) });
}

function configurationError(summary: string, help?: string) {
  return (error: unknown): boolean => {
    assert.ok(error instanceof ConfigurationError);
    assert.strictEqual(error.summary, summary);
    if (help !== undefined) assert.strictEqual(error.help, help);
    return true;
  };
}

describe("loadProjectConfig", () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTempDir("config");
  });

  afterEach(() => {
    cleanup(dir);
  });

  it("derives everything from a plain package.json", () => {
    writePackageJson(dir, { name: "localllm-studio", version: "1.2.0", main: "server/main.js" });
    const config = loadProjectConfig(dir);

    assert.strictEqual(config.productName, "localllm-studio");
    assert.strictEqual(config.appId, "localllm-studio");
    assert.strictEqual(config.bundleIdentifier, "com.localllm.studio");
    assert.strictEqual(config.version, "1.2.0");
    assert.strictEqual(config.description, "localllm-studio");
    assert.strictEqual(config.entry, "server/main.js");
    assert.deepStrictEqual(config.sourceTrees, []);
    assert.deepStrictEqual(config.requiredFiles, []);
    assert.deepStrictEqual(config.exclusions, [...DEFAULT_EXCLUSIONS]);
    assert.deepStrictEqual(config.dependencies.map((d) => d.name), DEFAULT_DEPENDENCIES.map((d) => d.name));
    assert.strictEqual(config.dmg, true);
    assert.strictEqual(config.desktopShortcut, false);
    assert.deepStrictEqual(config.categories, ["Utility", "Development"]);
    assert.strictEqual(config.buildDir, join(dir, "build"));
    assert.strictEqual(config.outputDir, join(dir, "dist"));
    assert.strictEqual(config.icon, undefined);
  });

  it("reads the bundlesmith settings", () => {
    writePackageJson(dir, {
      name: "localllm-studio",
      productName: "LocalLLM Studio",
      version: "1.2.0",
      bundlesmith: {
        entry: "server/app.js",
        bundleIdentifier: "org.example.studio",
        sourceTrees: ["server", { path: "ui/dist", dest: "ui" }],
        requiredFiles: ["app/ui/index.html"],
        exclude: ["substring:benchmark", { kind: "prefix", pattern: "libQt" }],
        defaultExclusions: false,
        icon: "assets/icon.png",
        dmg: false,
        desktopShortcut: true,
        categories: ["Science"],
        outputDir: "release",
      },
    });
    const config = loadProjectConfig(dir);

    assert.strictEqual(config.productName, "LocalLLM Studio");
    assert.strictEqual(config.entry, "server/app.js");
    assert.strictEqual(config.bundleIdentifier, "org.example.studio");
    assert.deepStrictEqual(config.sourceTrees, [{ path: "server" }, { path: "ui/dist", dest: "ui" }]);
    assert.deepStrictEqual(config.requiredFiles, ["app/ui/index.html"]);
    assert.deepStrictEqual(config.exclusions, [
      { kind: "substring", pattern: "benchmark" },
      { kind: "prefix", pattern: "libQt" },
    ]);
    assert.strictEqual(config.icon, join(dir, "assets", "icon.png"));
    assert.strictEqual(config.dmg, false);
    assert.strictEqual(config.desktopShortcut, true);
    assert.deepStrictEqual(config.categories, ["Science"]);
    assert.strictEqual(config.outputDir, join(dir, "release"));
  });

  it("overrides a default dependency and resolves local paths against the project", () => {
    writePackageJson(dir, {
      name: "localllm-studio",
      bundlesmith: {
        dependencies: [
          {
            name: "webview-nodejs",
            acquisitionOrder: [{ strategy: "local", parameters: { path: "vendor/webview-nodejs.tgz" } }],
          },
          {
            name: "sharp",
            required: false,
            acquisitionOrder: [{ strategy: "prebuilt" }],
          },
        ],
      },
    });
    const config = loadProjectConfig(dir);

    assert.deepStrictEqual(config.dependencies.map((d) => d.name), [
      "node-llama-cpp",
      "webview-nodejs",
      "@huggingface/hub",
      "sharp",
    ]);
    assert.deepStrictEqual(config.dependencies[1], {
      name: "webview-nodejs",
      required: true,
      acquisitionOrder: [{ strategy: "local", parameters: { path: join(dir, "vendor", "webview-nodejs.tgz") } }],
    });
    assert.deepStrictEqual(config.dependencies[3].acquisitionOrder, [{ strategy: "prebuilt", parameters: {} }]);
  });

  it("parses source strategy parameters", () => {
    writePackageJson(dir, {
      name: "localllm-studio",
      bundlesmith: {
        dependencies: [
          {
            name: "node-llama-cpp",
            acquisitionOrder: [
              {
                strategy: "source",
                parameters: { accelerationFlags: { cuda: ["-DGGML_CUDA=ON"] }, conflictingMarkers: ["pyenv"] },
              },
            ],
          },
        ],
      },
    });
    const [llama] = loadProjectConfig(dir).dependencies;
    assert.deepStrictEqual(llama.acquisitionOrder, [
      {
        strategy: "source",
        parameters: { accelerationFlags: { cuda: ["-DGGML_CUDA=ON"] }, conflictingMarkers: ["pyenv"] },
      },
    ]);
  });

  it("parses a package's own compile step", () => {
    const build = {
      command: ["node-llama-cpp", "source", "download"],
      accelerationArgs: { cuda: ["--gpu", "cuda"] },
      env: { NODE_LLAMA_CPP_SKIP_DOWNLOAD: "true" },
    };
    writePackageJson(dir, {
      name: "localllm-studio",
      bundlesmith: {
        dependencies: [
          {
            name: "node-llama-cpp",
            acquisitionOrder: [
              { strategy: "source", parameters: { flagEnvPrefix: "NODE_LLAMA_CPP_CMAKE_OPTION_", build } },
            ],
          },
        ],
      },
    });
    const [llama] = loadProjectConfig(dir).dependencies;
    assert.deepStrictEqual(llama.acquisitionOrder, [
      { strategy: "source", parameters: { flagEnvPrefix: "NODE_LLAMA_CPP_CMAKE_OPTION_", build } },
    ]);
  });

  it("rejects a compile step without a command", () => {
    writePackageJson(dir, {
      name: "localllm-studio",
      bundlesmith: {
        dependencies: [
          { name: "node-llama-cpp", acquisitionOrder: [{ strategy: "source", parameters: { build: { command: [] } } }] },
        ],
      },
    });
    assert.throws(
      () => loadProjectConfig(dir),
      configurationError(
        "invalid \"bundlesmith.dependencies[0].acquisitionOrder[0].parameters.build.command\" in package.json",
        "expected a binary name and its arguments",
      ),
    );
  });

  it("requires a package.json", () => {
    assert.throws(
      () => loadProjectConfig(dir),
      configurationError(`no package.json in ${dir}`, "run bundlesmith from the application's directory, or pass --project <dir>"),
    );
  });

  it("reports malformed JSON", () => {
    writeFiles(dir, { "package.json": "{ \"name\": " });
    assert.throws(() => loadProjectConfig(dir), configurationError(`could not parse ${join(dir, "package.json")}`));
  });

  it("rejects a wrongly typed field", () => {
    writePackageJson(dir, { name: "localllm-studio", bundlesmith: { dmg: "yes" } });
    assert.throws(
      () => loadProjectConfig(dir),
      configurationError("invalid \"bundlesmith.dmg\" in package.json", "expected true or false"),
    );
  });

  it("rejects an unknown strategy", () => {
    writePackageJson(dir, {
      name: "localllm-studio",
      bundlesmith: { dependencies: [{ name: "webview-nodejs", acquisitionOrder: [{ strategy: "conda" }] }] },
    });
    assert.throws(
      () => loadProjectConfig(dir),
      configurationError("invalid \"bundlesmith.dependencies[0].acquisitionOrder[0].strategy\" in package.json"),
    );
  });

  it("rejects unknown acceleration keys", () => {
    writePackageJson(dir, {
      name: "localllm-studio",
      bundlesmith: {
        dependencies: [
          {
            name: "node-llama-cpp",
            acquisitionOrder: [{ strategy: "source", parameters: { accelerationFlags: { rocm: ["-DGGML_HIP=ON"] } } }],
          },
        ],
      },
    });
    assert.throws(() => loadProjectConfig(dir), ConfigurationError);
  });

  it("requires a name", () => {
    writePackageJson(dir, { version: "1.0.0" });
    assert.throws(() => loadProjectConfig(dir), configurationError("the application has no name"));
  });
});

describe("mergeDependencies", () => {
  it("replaces by name and appends the rest", () => {
    const a: DependencySpec = { name: "a", required: true, acquisitionOrder: [] };
    const b: DependencySpec = { name: "b", required: true, acquisitionOrder: [] };
    const b2: DependencySpec = { name: "b", required: false, acquisitionOrder: [] };
    const c: DependencySpec = { name: "c", required: true, acquisitionOrder: [] };
    assert.deepStrictEqual(mergeDependencies([a, b], [c, b2]), [a, b2, c]);
  });
});

describe("slugify", () => {
  it("drops the scope and normalizes separators", () => {
    assert.strictEqual(slugify("@example/LocalLLM Studio"), "localllm-studio");
    assert.strictEqual(slugify("  My App!  "), "my-app");
  });
});
