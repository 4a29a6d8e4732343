import { chmodSync, copyFileSync, mkdirSync, writeFileSync } from "node:fs";
import { extname, join } from "node:path";
import { fileURLToPath } from "node:url";
import type { BuildTarget, CpuArch } from "../target.js";
import {
  artifactBaseName,
  BasePackager,
  type AppMetadata,
  type ArtifactKind,
  type AssembledArtifact,
  type PackagingJob,
} from "./base.js";

/** Shipped with the package; appimagetool refuses an AppDir without an icon. */
export const DEFAULT_LINUX_ICON = fileURLToPath(new URL("../../assets/default-icon.svg", import.meta.url));

/** Architecture names appimagetool reads from `ARCH`. */
export function appImageArch(arch: CpuArch): string {
  return arch === "arm64" ? "aarch64" : "x86_64";
}

/**
 * Launcher at the AppDir root: resolve the AppDir through the mount point
 * symlinks, then hand over to the executable with the original arguments.
 */
export function renderAppRun(executable: string): string {
  return `#!/bin/sh
SELF=$(readlink -f "$0")
HERE=\${SELF%/*}
exec "$HERE/${executable}" "$@"
`;
}

export function renderDesktopEntry(app: AppMetadata): string {
  const lines = [
    "[Desktop Entry]",
    "Type=Application",
    `Name=${app.productName}`,
    `Comment=${app.description}`,
    "Exec=AppRun",
    `Icon=${app.appId}`,
    "Terminal=false",
    `Categories=${app.categories.map((c) => `${c};`).join("")}`,
  ];
  return lines.join("\n") + "\n";
}

/**
 * `<Name>-<version>-<arch>.AppImage` built from an AppDir.
 */
export class LinuxPackager extends BasePackager {
  readonly os = "linux" as const;

  plannedArtifact(target: BuildTarget, outputDir: string): { kind: ArtifactKind; path: string } {
    return { kind: "filesystem_image", path: join(outputDir, this.imageName(target)) };
  }

  protected async assemble(job: PackagingJob): Promise<AssembledArtifact> {
    const appDir = join(job.workDir, `${artifactBaseName(this.app.productName)}.AppDir`);
    mkdirSync(appDir, { recursive: true });

    await this.compileExecutable(job, join(appDir, this.app.appId));

    const appRun = join(appDir, "AppRun");
    writeFileSync(appRun, renderAppRun(this.app.appId));
    // writeFileSync's mode is filtered through the umask
    chmodSync(appRun, 0o755);

    const icon = this.app.icon ?? DEFAULT_LINUX_ICON;
    copyFileSync(icon, join(appDir, `${this.app.appId}${extname(icon) || ".png"}`));
    copyFileSync(icon, join(appDir, ".DirIcon"));
    writeFileSync(join(appDir, `${this.app.appId}.desktop`), renderDesktopEntry(this.app));

    const image = join(job.workDir, this.imageName(job.target));
    await this.runTool(
      "appimagetool",
      ["--no-appstream", appDir, image],
      this.imageName(job.target),
      { ARCH: appImageArch(job.target.arch) },
    );
    return { kind: "filesystem_image", path: image };
  }

  private imageName(target: BuildTarget): string {
    return `${artifactBaseName(this.app.productName)}-${this.app.version}-${appImageArch(target.arch)}.AppImage`;
  }
}
