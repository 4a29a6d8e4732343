/**
 * Progress and diagnostics sink for the pipeline.
 *
 * Pipeline stages never write to the terminal directly; the CLI supplies a
 * reporter that renders step progress and colors, tests supply a recording one.
 */

export interface Reporter {
  info(message: string): void;
  warn(message: string): void;
  /** Only shown in verbose mode. */
  debug(message: string): void;
}

export const silentReporter: Reporter = {
  info() {},
  warn() {},
  debug() {},
};
