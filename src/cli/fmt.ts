/**
 * Shared ANSI formatting helpers for CLI output.
 *
 * Uses node:util styleText for consistent coloring across all
 * `bundlesmith` subcommands.
 */

import { styleText } from "node:util";

export const cyan = (t: string) => styleText("cyan", t);
export const cyanBold = (t: string) => styleText("bold", styleText("cyan", t));
export const greenBold = (t: string) => styleText("bold", styleText("green", t));
export const whiteBold = (t: string) => styleText("bold", styleText("white", t));
export const yellow = (t: string) => styleText("yellow", t);
export const dim = (t: string) => styleText("dim", t);
export const bold = (t: string) => styleText("bold", t);
export const redBold = (t: string) => styleText("bold", styleText("red", t));
