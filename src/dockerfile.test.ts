import { describe, it } from "node:test";
import assert from "node:assert";
import { DEFAULT_DEPENDENCIES } from "./dependencies.js";
import { cudaBuildStep, isDockerVariant, renderDockerfile, type DockerfileOptions } from "./dockerfile.js";
import { DependencyResolver } from "./resolver.js";
import { FakeRunner } from "./test-harness.js";

const OPTIONS: DockerfileOptions = {
  productName: "LocalLLM Studio",
  entry: "server/main.js",
  sourceTrees: [{ path: "server" }, { path: "ui/dist/", dest: "ui" }],
};

describe("renderDockerfile", () => {
  it("renders the CPU image on the Node.js base", () => {
    const lines = renderDockerfile("cpu", OPTIONS).split("\n");
    assert.strictEqual(lines[0], "# LocalLLM Studio (CPU image)");
    assert.strictEqual(lines[1], "FROM node:20-bookworm-slim");
    assert.ok(lines.includes("RUN npm install --omit=dev --no-audit --no-fund"));
    assert.ok(lines.includes("COPY server/ ./server/"));
    assert.ok(lines.includes("COPY ui/dist/ ./ui/"));
    assert.ok(lines.includes("COPY server/main.js ./server/main.js"));
    assert.ok(lines.includes("EXPOSE 7860 8000"));
    assert.ok(lines.includes("    CMD curl -f http://localhost:8000/health || exit 1"));
    assert.strictEqual(lines.at(-2), "CMD [\"node\", \"server/main.js\", \"--api\", \"--port\", \"8000\"]");
    assert.ok(!lines.some((line) => line.includes("node-llama-cpp")));
  });

  it("compiles the inference binding against CUDA", () => {
    const resolver = new DependencyResolver({ runner: new FakeRunner(), platform: "linux", baseEnv: {} });
    const inferenceBuild = cudaBuildStep(DEFAULT_DEPENDENCIES[0], resolver);
    const lines = renderDockerfile("cuda", { ...OPTIONS, inferenceBuild }).split("\n");
    assert.strictEqual(lines[0], "# LocalLLM Studio (CUDA image)");
    assert.ok(lines.includes("FROM nvidia/cuda:12.1.1-devel-ubuntu22.04"));
    assert.ok(lines.includes("COPY --from=node /usr/local/bin/node /usr/local/bin/node"));
    assert.ok(
      lines.includes(
        "RUN export NODE_LLAMA_CPP_CMAKE_OPTION_GGML_CUDA=\"ON\" NODE_LLAMA_CPP_SKIP_DOWNLOAD=\"true\""
          + " && npm install --prefix /app --no-audit --no-fund node-llama-cpp@^3.0.0"
          + " && npm exec --no -- node-llama-cpp source download --gpu cuda",
      ),
    );
    assert.ok(lines.includes("    python3 \\"));
  });

  it("exports a single flags variable for npm-compiled bindings", () => {
    const resolver = new DependencyResolver({ runner: new FakeRunner(), platform: "linux", baseEnv: {} });
    const step = cudaBuildStep(
      { name: "llama-addon", required: true, acquisitionOrder: [{ strategy: "source", parameters: {} }] },
      resolver,
    );
    assert.deepStrictEqual(step, {
      env: { CMAKE_ARGS: "-DGGML_CUDA=ON" },
      command: "npm install --prefix /app --no-audit --no-fund --build-from-source llama-addon",
    });
    assert.strictEqual(cudaBuildStep({ name: "webview-nodejs", required: true, acquisitionOrder: [] }, resolver), undefined);
  });

  it("uses the configured ports", () => {
    const text = renderDockerfile("cpu", { ...OPTIONS, uiPort: 3000, apiPort: 3001 });
    assert.ok(text.includes("EXPOSE 3000 3001\n"));
    assert.ok(text.includes("http://localhost:3001/health"));
  });
});

describe("isDockerVariant", () => {
  it("accepts only cpu and cuda", () => {
    assert.strictEqual(isDockerVariant("cpu"), true);
    assert.strictEqual(isDockerVariant("cuda"), true);
    assert.strictEqual(isDockerVariant("rocm"), false);
  });
});
