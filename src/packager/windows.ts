import { dirname, join } from "node:path";
import type { BuildTarget } from "../target.js";
import {
  artifactBaseName,
  BasePackager,
  type ArtifactKind,
  type AssembledArtifact,
  type PackageArtifact,
  type PackagingJob,
} from "./base.js";

/** Single-quoted PowerShell literal. */
function psQuote(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}

/**
 * PowerShell that creates `<Name>.lnk` on the user's desktop.
 */
export function shortcutScript(name: string, targetPath: string): string {
  return [
    "$shell = New-Object -ComObject WScript.Shell",
    `$link = $shell.CreateShortcut([IO.Path]::Combine([Environment]::GetFolderPath('Desktop'), ${psQuote(`${name}.lnk`)}))`,
    `$link.TargetPath = ${psQuote(targetPath)}`,
    `$link.WorkingDirectory = ${psQuote(dirname(targetPath))}`,
    "$link.Save()",
  ].join("; ");
}

/**
 * A single `<Name>.exe`, with an optional desktop shortcut.
 */
export class WindowsPackager extends BasePackager {
  readonly os = "windows" as const;

  plannedArtifact(_target: BuildTarget, outputDir: string): { kind: ArtifactKind; path: string } {
    return { kind: "installer_exe", path: join(outputDir, this.executableName()) };
  }

  protected async assemble(job: PackagingJob): Promise<AssembledArtifact> {
    const exe = join(job.workDir, this.executableName());
    await this.compileExecutable(job, exe);
    return { kind: "installer_exe", path: exe };
  }

  protected async afterPublish(artifact: PackageArtifact): Promise<void> {
    if (!this.app.desktopShortcut) return;

    // The shortcut lives outside the output directory; failing to make one
    // leaves a usable executable, so it does not fail the build
    const result = await this.context.runner.run(
      "powershell",
      ["-NoProfile", "-NonInteractive", "-Command", shortcutScript(this.app.productName, artifact.path)],
      { signal: this.context.signal },
    );
    if (result.exitCode !== 0) {
      this.reporter.warn(`could not create a desktop shortcut (powershell exited with code ${result.exitCode})`);
    }
  }

  private executableName(): string {
    return `${artifactBaseName(this.app.productName)}.exe`;
  }
}
