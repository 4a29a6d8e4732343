import { describe, it, beforeEach, afterEach } from "node:test";
import assert from "node:assert";
import { join } from "node:path";
import { DEFAULT_DEPENDENCIES, type DependencySpec } from "./dependencies.js";
import { DependencyUnavailableError } from "./errors.js";
import {
  describeAttempt,
  DependencyResolver,
  flagVariables,
  isNetworkFailure,
  packageDir,
  sanitizeBuildEnv,
} from "./resolver.js";
import { createBuildTarget } from "./target.js";
import {
  cleanup,
  failed,
  FakeRunner,
  installFakePackage,
  makeTempDir,
  npmInstaller,
  ok,
  prefixOf,
  recordingReporter,
} from "./test-harness.js";

const LLAMA: DependencySpec = {
  name: "node-llama-cpp",
  version: "^3.0.0",
  required: true,
  acquisitionOrder: [
    // Declared out of order on purpose
    { strategy: "source", parameters: {} },
    {
      strategy: "prebuilt",
      parameters: { variants: { "linux-x86_64-cuda": "@node-llama-cpp/linux-x64-cuda" } },
    },
  ],
};

const CPU_LINUX = createBuildTarget("linux", "x86_64", "none");
const CUDA_LINUX = createBuildTarget("linux", "x86_64", "cuda");
const METAL_MAC = createBuildTarget("macos", "arm64", "metal");

describe("DependencyResolver", () => {
  let envRoot: string;

  beforeEach(() => {
    envRoot = makeTempDir("resolver");
  });

  afterEach(() => {
    cleanup(envRoot);
  });

  describe("plan", () => {
    it("orders prebuilt attempts before source builds", () => {
      const resolver = new DependencyResolver({ runner: new FakeRunner(), platform: "linux", baseEnv: {} });
      const plan = resolver.plan(LLAMA, CPU_LINUX, envRoot);
      assert.deepStrictEqual(plan.map((p) => p.strategy), ["prebuilt", "source"]);
      assert.strictEqual(plan[0].command, "npm");
      assert.deepStrictEqual(plan[0].args, [
        "install",
        "--prefix",
        envRoot,
        "--no-audit",
        "--no-fund",
        "node-llama-cpp@^3.0.0",
      ]);
      assert.deepStrictEqual(plan[1].args.slice(-2), ["--build-from-source", "node-llama-cpp@^3.0.0"]);
    });

    it("adds the acceleration variant for the target", () => {
      const resolver = new DependencyResolver({ runner: new FakeRunner(), platform: "linux", baseEnv: {} });
      const [prebuilt] = resolver.plan(LLAMA, CUDA_LINUX, envRoot);
      assert.deepStrictEqual(prebuilt.args.slice(-2), ["node-llama-cpp@^3.0.0", "@node-llama-cpp/linux-x64-cuda"]);
      assert.deepStrictEqual(prebuilt.expects, ["node-llama-cpp", "@node-llama-cpp/linux-x64-cuda"]);
    });

    it("passes an alternate registry", () => {
      const resolver = new DependencyResolver({ runner: new FakeRunner(), platform: "linux", baseEnv: {} });
      const [prebuilt] = resolver.plan(
        {
          name: "webview-nodejs",
          required: true,
          acquisitionOrder: [{ strategy: "prebuilt", parameters: { registry: "https://npm.example.test" } }],
        },
        CPU_LINUX,
        envRoot,
      );
      assert.deepStrictEqual(prebuilt.args.slice(5), ["--registry", "https://npm.example.test", "webview-nodejs"]);
    });

    it("installs local packages as copies", () => {
      const resolver = new DependencyResolver({ runner: new FakeRunner(), platform: "linux", baseEnv: {} });
      const [local] = resolver.plan(
        {
          name: "webview-nodejs",
          required: true,
          acquisitionOrder: [{ strategy: "local", parameters: { path: "/vendor/webview-nodejs-0.4.2.tgz" } }],
        },
        CPU_LINUX,
        envRoot,
      );
      assert.deepStrictEqual(local.args.slice(5), ["--install-links", "/vendor/webview-nodejs-0.4.2.tgz"]);
    });

    it("sets acceleration flags and strips conda from the source build", () => {
      const resolver = new DependencyResolver({
        runner: new FakeRunner(),
        platform: "darwin",
        baseEnv: {
          PATH: "/opt/anaconda3/bin:/usr/local/bin:/usr/bin",
          CONDA_PREFIX: "/opt/anaconda3",
          HOME: "/Users/test",
        },
      });
      const source = resolver.plan(LLAMA, METAL_MAC, envRoot)[1];
      assert.strictEqual(source.env.CMAKE_ARGS, "-DGGML_METAL=ON");
      assert.strictEqual(source.env.PATH, "/usr/local/bin:/usr/bin");
      assert.strictEqual(source.env.CONDA_PREFIX, undefined);
      assert.strictEqual(source.env.HOME, "/Users/test");
      assert.deepStrictEqual(source.removedPathEntries, ["/opt/anaconda3/bin"]);
    });

    it("uses per-dependency flags and flag variable", () => {
      const resolver = new DependencyResolver({ runner: new FakeRunner(), platform: "linux", baseEnv: {} });
      const [source] = resolver.plan(
        {
          name: "node-llama-cpp",
          required: true,
          acquisitionOrder: [
            {
              strategy: "source",
              parameters: { flagsEnv: "NODE_LLAMA_CPP_CMAKE_OPTION", accelerationFlags: { cuda: ["-DGGML_CUDA=ON", "-DCMAKE_CUDA_ARCHITECTURES=86"] } },
            },
          ],
        },
        CUDA_LINUX,
        envRoot,
      );
      assert.strictEqual(source.env.NODE_LLAMA_CPP_CMAKE_OPTION, "-DGGML_CUDA=ON -DCMAKE_CUDA_ARCHITECTURES=86");
      assert.strictEqual(source.env.CMAKE_ARGS, undefined);
    });

    it("compiles the default inference binding through its own source command", () => {
      const resolver = new DependencyResolver({ runner: new FakeRunner(), platform: "darwin", baseEnv: {} });
      const source = resolver.plan(DEFAULT_DEPENDENCIES[0], METAL_MAC, envRoot)[1];

      assert.strictEqual(source.strategy, "source");
      assert.deepStrictEqual(source.args.slice(-1), ["node-llama-cpp@^3.0.0"]);
      assert.ok(!source.args.includes("--build-from-source"));
      assert.deepStrictEqual(source.build, {
        command: "npm",
        args: ["exec", "--no", "--", "node-llama-cpp", "source", "download", "--gpu", "metal"],
      });
      assert.strictEqual(source.env.NODE_LLAMA_CPP_CMAKE_OPTION_GGML_METAL, "ON");
      assert.strictEqual(source.env.NODE_LLAMA_CPP_SKIP_DOWNLOAD, "true");
      assert.strictEqual(source.env.CMAKE_ARGS, undefined);
      assert.strictEqual(
        describeAttempt(source),
        `npm install --prefix ${envRoot} --no-audit --no-fund node-llama-cpp@^3.0.0`
          + " && npm exec --no -- node-llama-cpp source download --gpu metal",
      );
    });

    it("builds CPU-only binaries with the GPU disabled", () => {
      const resolver = new DependencyResolver({ runner: new FakeRunner(), platform: "linux", baseEnv: {} });
      const source = resolver.plan(DEFAULT_DEPENDENCIES[0], CPU_LINUX, envRoot)[1];
      assert.deepStrictEqual(source.build?.args.slice(-2), ["--gpu", "false"]);
      assert.strictEqual(source.env.NODE_LLAMA_CPP_CMAKE_OPTION_GGML_NATIVE, "OFF");
    });
  });

  describe("resolve", () => {
    it("returns the prebuilt install when it succeeds", async () => {
      const runner = new FakeRunner().on(
        "npm",
        npmInstaller({ "node-llama-cpp": { version: "3.1.0" } }),
      );
      const resolver = new DependencyResolver({ runner, platform: "linux", baseEnv: {} });
      const installed = await resolver.resolve(LLAMA, CPU_LINUX, envRoot);

      assert.deepStrictEqual(installed, {
        name: "node-llama-cpp",
        version: "3.1.0",
        strategy: "prebuilt",
        directory: join(envRoot, "node_modules", "node-llama-cpp"),
      });
      assert.strictEqual(runner.calls.length, 1);
      assert.strictEqual(runner.calls[0].options.cwd, envRoot);
    });

    it("records the variant package", async () => {
      const runner = new FakeRunner().on(
        "npm",
        npmInstaller({
          "node-llama-cpp": { version: "3.1.0" },
          "@node-llama-cpp/linux-x64-cuda": { version: "3.1.0" },
        }),
      );
      const resolver = new DependencyResolver({ runner, platform: "linux", baseEnv: {} });
      const installed = await resolver.resolve(LLAMA, CUDA_LINUX, envRoot);
      assert.strictEqual(installed.variant, "@node-llama-cpp/linux-x64-cuda");
    });

    it("falls back to a source build when the prebuilt fails", async () => {
      const runner = new FakeRunner().on("npm", ({ args }) => {
        if (!args.includes("--build-from-source")) {
          return failed("npm ERR! no prebuilt binary for darwin-arm64");
        }
        installFakePackage(prefixOf(args), "node-llama-cpp", { version: "3.1.0" });
        return ok();
      });
      const reporter = recordingReporter();
      const resolver = new DependencyResolver({
        runner,
        platform: "darwin",
        baseEnv: { PATH: "/opt/anaconda3/bin:/usr/bin" },
        reporter,
      });

      const installed = await resolver.resolve(LLAMA, METAL_MAC, envRoot);
      assert.strictEqual(installed.strategy, "source");
      assert.strictEqual(runner.calls.length, 2);
      assert.strictEqual(runner.calls[1].options.env?.CMAKE_ARGS, "-DGGML_METAL=ON");
      assert.strictEqual(runner.calls[1].options.env?.PATH, "/usr/bin");
      assert.ok(reporter.debugs.includes("node-llama-cpp: dropped /opt/anaconda3/bin from the build search path"));
    });

    it("runs the compile step after installing and fails the attempt when it fails", async () => {
      const install = npmInstaller({ "node-llama-cpp": { version: "3.1.0" } });
      const runner = new FakeRunner().on("npm", (call) => {
        if (call.args[0] === "exec") return failed("CMake Error: could not find CMAKE_C_COMPILER");
        return install(call);
      });
      const spec: DependencySpec = { ...DEFAULT_DEPENDENCIES[0], acquisitionOrder: [DEFAULT_DEPENDENCIES[0].acquisitionOrder[1]] };
      const resolver = new DependencyResolver({ runner, platform: "linux", baseEnv: {} });

      await assert.rejects(resolver.resolve(spec, CPU_LINUX, envRoot), (error: unknown) => {
        assert.ok(error instanceof DependencyUnavailableError);
        assert.deepStrictEqual(error.attempts.map((a) => [a.strategy, a.failure, a.detail]), [
          ["source", "failed", "CMake Error: could not find CMAKE_C_COMPILER"],
        ]);
        assert.ok(error.attempts[0].command.endsWith("&& npm exec --no -- node-llama-cpp source download --gpu false"));
        return true;
      });
      assert.deepStrictEqual(runner.calls.map((c) => c.args[0]), ["install", "exec"]);
      assert.strictEqual(runner.calls[1].options.cwd, envRoot);
      assert.strictEqual(runner.calls[1].options.env?.NODE_LLAMA_CPP_SKIP_DOWNLOAD, "true");
    });

    it("treats a zero exit without the package as a failed attempt", async () => {
      const runner = new FakeRunner().on("npm", ({ args }) => {
        if (args.includes("--build-from-source")) {
          installFakePackage(prefixOf(args), "node-llama-cpp", { version: "3.1.0" });
        }
        return ok();
      });
      const resolver = new DependencyResolver({ runner, platform: "linux", baseEnv: {} });
      const installed = await resolver.resolve(LLAMA, CPU_LINUX, envRoot);
      assert.strictEqual(installed.strategy, "source");
    });

    it("names every attempt once when all strategies fail", async () => {
      const runner = new FakeRunner().on("npm", () => failed("gyp ERR! build error\ngyp ERR! stack Error: `make` failed"));
      const resolver = new DependencyResolver({ runner, platform: "linux", baseEnv: {} });

      await assert.rejects(resolver.resolve(LLAMA, CPU_LINUX, envRoot), (error: unknown) => {
        assert.ok(error instanceof DependencyUnavailableError);
        assert.strictEqual(error.dependency, "node-llama-cpp");
        assert.strictEqual(error.required, true);
        assert.deepStrictEqual(error.attempts.map((a) => a.strategy), ["prebuilt", "source"]);
        assert.deepStrictEqual(error.attempts.map((a) => a.failure), ["failed", "failed"]);
        assert.strictEqual(error.attempts[0].detail, "gyp ERR! build error\ngyp ERR! stack Error: `make` failed");
        assert.strictEqual(error.networkUnavailable, false);
        return true;
      });
      assert.strictEqual(runner.calls.length, 2);
    });

    it("classifies an unreachable registry", async () => {
      const runner = new FakeRunner().on("npm", () => failed("npm ERR! code ENOTFOUND\nnpm ERR! network request failed"));
      const resolver = new DependencyResolver({ runner, platform: "linux", baseEnv: {} });

      await assert.rejects(resolver.resolve(LLAMA, CPU_LINUX, envRoot), (error: unknown) => {
        assert.ok(error instanceof DependencyUnavailableError);
        assert.deepStrictEqual(error.attempts.map((a) => a.failure), ["network-unavailable", "network-unavailable"]);
        assert.strictEqual(error.networkUnavailable, true);
        return true;
      });
    });

    it("reports an empty acquisition order as unavailable", async () => {
      const runner = new FakeRunner();
      const resolver = new DependencyResolver({ runner, platform: "linux", baseEnv: {} });
      await assert.rejects(
        resolver.resolve({ name: "@huggingface/hub", required: false, acquisitionOrder: [] }, CPU_LINUX, envRoot),
        (error: unknown) => error instanceof DependencyUnavailableError && error.attempts.length === 0,
      );
      assert.strictEqual(runner.calls.length, 0);
    });
  });
});

describe("flagVariables", () => {
  it("turns -D definitions into prefixed variables", () => {
    assert.deepStrictEqual(flagVariables(["-DGGML_CUDA=ON", "-DCMAKE_CUDA_ARCHITECTURES=86;89", "-G", "Ninja"], "OPT_"), {
      OPT_GGML_CUDA: "ON",
      OPT_CMAKE_CUDA_ARCHITECTURES: "86;89",
    });
  });
});

describe("sanitizeBuildEnv", () => {
  it("leaves the input untouched", () => {
    const env = { PATH: "/opt/miniconda3/bin:/usr/bin", CONDA_DEFAULT_ENV: "base" };
    const { env: sanitized, removed } = sanitizeBuildEnv(env, { platform: "linux" });
    assert.strictEqual(sanitized.PATH, "/usr/bin");
    assert.strictEqual(sanitized.CONDA_DEFAULT_ENV, undefined);
    assert.deepStrictEqual(removed, ["/opt/miniconda3/bin"]);
    assert.strictEqual(env.PATH, "/opt/miniconda3/bin:/usr/bin");
    assert.strictEqual(env.CONDA_DEFAULT_ENV, "base");
  });

  it("handles Windows path casing and separators", () => {
    const { env, removed } = sanitizeBuildEnv(
      { Path: "C:\\Users\\test\\Anaconda3;C:\\Windows\\System32" },
      { platform: "win32" },
    );
    assert.strictEqual(env.Path, "C:\\Windows\\System32");
    assert.deepStrictEqual(removed, ["C:\\Users\\test\\Anaconda3"]);
  });

  it("accepts custom markers", () => {
    const { env } = sanitizeBuildEnv({ PATH: "/opt/homebrew/bin:/usr/bin" }, { platform: "darwin", markers: ["homebrew"] });
    assert.strictEqual(env.PATH, "/usr/bin");
  });
});

describe("isNetworkFailure", () => {
  it("recognizes resolver and connection errors", () => {
    assert.strictEqual(isNetworkFailure(failed("getaddrinfo EAI_AGAIN registry.npmjs.org")), true);
    assert.strictEqual(isNetworkFailure(failed("connect ECONNREFUSED 127.0.0.1:443")), true);
    assert.strictEqual(isNetworkFailure(failed("npm ERR! 404 Not Found")), false);
  });
});

describe("packageDir", () => {
  it("splits scoped names into directories", () => {
    assert.strictEqual(packageDir("/env", "@huggingface/hub"), join("/env", "node_modules", "@huggingface", "hub"));
  });
});
