/**
 * Step progress for `bundlesmith build`.
 *
 * One line per build step: an animated `[n/6]` line while the step runs on a
 * terminal, then a `✔` line with the step's duration or a `✖` line naming the
 * step that failed. Off a terminal the open and close lines are printed plainly.
 */

import { BUILD_STEPS, type BuildStep, type BuildTransition } from "../orchestrator.js";

// Not ora: the compiled CLI runs inside pkg's virtual filesystem, where ora's
// dependencies read process.stderr.isTTY at module load time.

export const STEP_LABELS: Record<BuildStep, string> = {
  ProfileResolved: "Resolving build target",
  EnvironmentReady: "Preparing isolated environment",
  DependenciesInstalled: "Installing dependencies",
  ManifestBuilt: "Assembling bundle manifest",
  Packaged: "Packaging",
  Done: "Cleaning up",
};

export function stepLine(step: BuildStep): string {
  return `[${BUILD_STEPS.indexOf(step) + 1}/${BUILD_STEPS.length}] ${STEP_LABELS[step]}`;
}

export function formatElapsed(ms: number): string {
  return ms < 1000 ? `${Math.round(ms)}ms` : `${(ms / 1000).toFixed(1)}s`;
}

/** Where progress goes; `process.stderr` in the CLI. */
export interface ProgressOutput {
  write(chunk: string): unknown;
  isTTY?: boolean;
}

export interface StepProgressOptions {
  /** Suppress step lines. Lines passed to `print` are still written. */
  quiet?: boolean;
  output?: ProgressOutput;
  now?: () => number;
}

export interface StepProgress {
  /** The step being worked towards, if any. */
  readonly current: BuildStep | undefined;
  /** Open the first step. */
  begin(): void;
  /** Close the step a transition completes (or fails) and open the next one. */
  advance(transition: BuildTransition): void;
  /** Write a line above the running step. */
  print(line: string): void;
  stop(): void;
}

const FRAMES = ["⠋", "⠙", "⠹", "⠸", "⠼", "⠴", "⠦", "⠧", "⠇", "⠏"];
const FRAME_INTERVAL = 80;

export function createStepProgress(options: StepProgressOptions = {}): StepProgress {
  const output = options.output ?? process.stderr;
  const now = options.now ?? Date.now;
  const quiet = options.quiet ?? false;

  let current: BuildStep | undefined;
  let startedAt = 0;
  let frame = 0;
  let timer: ReturnType<typeof setInterval> | undefined;

  const isTTY = () => output.isTTY === true;

  const render = () => {
    if (current === undefined) return;
    output.write(`\r${FRAMES[frame % FRAMES.length]} ${stepLine(current)}`);
    frame++;
  };

  const halt = () => {
    if (timer) {
      clearInterval(timer);
      timer = undefined;
    }
    if (isTTY() && current !== undefined && !quiet) {
      output.write("\r\x1b[K");
    }
  };

  const open = (step: BuildStep | undefined) => {
    current = step;
    startedAt = now();
    if (step === undefined || quiet) return;
    if (isTTY()) {
      frame = 0;
      render();
      timer = setInterval(render, FRAME_INTERVAL);
    } else {
      output.write(`- ${stepLine(step)}\n`);
    }
  };

  const close = (symbol: string, suffix: string) => {
    const step = current;
    halt();
    current = undefined;
    if (step === undefined || quiet) return;
    output.write(`${symbol} ${stepLine(step)}${suffix}\n`);
  };

  return {
    get current() {
      return current;
    },

    begin() {
      open(BUILD_STEPS[0]);
    },

    advance(transition) {
      if (transition.to === "Init") return;
      if (transition.to === "Failed") {
        close("✖", "");
        return;
      }
      close("✔", ` (${formatElapsed(now() - startedAt)})`);
      open(BUILD_STEPS[transition.index]);
    },

    print(line) {
      const running = timer !== undefined;
      if (running) output.write("\r\x1b[K");
      output.write(`${line}\n`);
      if (running) render();
    },

    stop() {
      halt();
      current = undefined;
    },
  };
}
