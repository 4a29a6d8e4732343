/**
 * Packager selection: one packaging procedure per OS family.
 */

import { ProfileUnsupportedError } from "../errors.js";
import type { BuildTarget, OsFamily } from "../target.js";
import type { AppMetadata, Packager, PackagerContext } from "./base.js";
import { LinuxPackager } from "./linux.js";
import { MacosPackager } from "./macos.js";
import { WindowsPackager } from "./windows.js";

export type PackagerFactory = (app: AppMetadata, context: PackagerContext) => Packager;

export type PackagerRegistry = Partial<Record<OsFamily, PackagerFactory>>;

export const DEFAULT_PACKAGERS: PackagerRegistry = {
  macos: (app, context) => new MacosPackager(app, context),
  windows: (app, context) => new WindowsPackager(app, context),
  linux: (app, context) => new LinuxPackager(app, context),
};

/**
 * The packager for `target`'s OS family.
 *
 * @throws ProfileUnsupportedError when no procedure is registered for it
 */
export function selectPackager(
  target: BuildTarget,
  app: AppMetadata,
  context: PackagerContext,
  registry: PackagerRegistry = DEFAULT_PACKAGERS,
): Packager {
  const factory = registry[target.os];
  if (!factory) {
    throw new ProfileUnsupportedError({
      platform: target.os,
      arch: target.arch,
      reason: `no packaging procedure is registered for ${target.os}`,
    });
  }
  return factory(app, context);
}

export {
  artifactBaseName,
  BasePackager,
  externalModules,
  movePath,
  pathSize,
  stageManifest,
  type AppMetadata,
  type ArtifactKind,
  type AssembledArtifact,
  type PackageArtifact,
  type Packager,
  type PackagerContext,
  type PackagingJob,
} from "./base.js";
export { PkgCompiler, pkgTarget, type CompileRequest, type ExecutableCompiler } from "./compiler.js";
export { appImageArch, DEFAULT_LINUX_ICON, LinuxPackager, renderAppRun, renderDesktopEntry } from "./linux.js";
export { MacosPackager, renderInfoPlist } from "./macos.js";
export { shortcutScript, WindowsPackager } from "./windows.js";
