/**
 * Shared CLI help text and helpers.
 */

import { cyan, cyanBold, dim, greenBold, redBold, whiteBold } from "./fmt.js";

/**
 * Print the main help screen to stdout.
 */
export function showMainHelp(): void {
  console.log(`
${cyanBold("bundlesmith")} - ${whiteBold("package local LLM desktop apps for macOS, Windows and Linux")}

${greenBold("Usage:")}
  ${cyanBold("bundlesmith build")} ${dim("[options]")}          Build the installable artifact for this machine
  ${cyanBold("bundlesmith profile")} ${dim("[options]")}        Show the resolved build target
  ${cyanBold("bundlesmith dockerfile")} ${dim("[options]")}     Print a container recipe
  ${cyanBold("bundlesmith")} ${cyan("--help")}                    Show this help message
  ${cyanBold("bundlesmith")} ${cyan("--version")}                 Show version

${greenBold("Examples:")}
  ${cyanBold("bundlesmith build")}
  ${cyanBold("bundlesmith build")} ${cyan("--gpu cuda -o release")}
  ${cyanBold("bundlesmith dockerfile")} ${cyan("--variant cuda > Dockerfile")}

Run ${cyanBold("bundlesmith <command> --help")} for command options.
`.trim() + "\n");
}

/**
 * Check if args contain a help flag (--help or -h).
 */
export function hasHelpFlag(args: string[]): boolean {
  return args.includes("--help") || args.includes("-h");
}

/**
 * Format an error message with a red bold "Error:" prefix.
 * Use with console.error(): `console.error(fmtError("something went wrong"))`
 */
export function fmtError(message: string): string {
  return `${redBold("Error:")} ${message}`;
}

/**
 * Take the value following a flag, e.g. `--os linux`.
 */
export function takeValue(args: string[], index: number, flag: string): string {
  const value = args[index + 1];
  if (value === undefined || value.startsWith("-")) {
    throw new Error(`Missing value for ${flag}`);
  }
  return value;
}
