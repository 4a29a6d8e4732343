import { copyFileSync, mkdirSync, renameSync, symlinkSync, writeFileSync } from "node:fs";
import { extname, join } from "node:path";
import type { BuildTarget } from "../target.js";
import {
  artifactBaseName,
  BasePackager,
  type AppMetadata,
  type ArtifactKind,
  type AssembledArtifact,
  type PackagingJob,
} from "./base.js";

function escapeXml(value: string): string {
  return value
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&apos;");
}

/**
 * Info.plist for the app bundle. The app shows in the Dock, renders at
 * Retina resolution and follows the system appearance.
 */
export function renderInfoPlist(app: AppMetadata, executable: string, iconFile?: string): string {
  const entries: Array<[string, string | boolean]> = [
    ["CFBundleName", app.productName],
    ["CFBundleDisplayName", app.productName],
    ["CFBundleExecutable", executable],
    ["CFBundleIdentifier", app.bundleIdentifier],
    ["CFBundleVersion", app.version],
    ["CFBundleShortVersionString", app.version],
    ["CFBundlePackageType", "APPL"],
    ["NSHighResolutionCapable", true],
    ["LSUIElement", false],
    ["NSRequiresAquaSystemAppearance", false],
  ];
  if (iconFile) {
    entries.push(["CFBundleIconFile", iconFile]);
  }

  const body = entries
    .map(([key, value]) => {
      const rendered = typeof value === "boolean" ? `<${value}/>` : `<string>${escapeXml(value)}</string>`;
      return `    <key>${key}</key>\n    ${rendered}`;
    })
    .join("\n");

  return `<?xml version="1.0" encoding="UTF-8"?>
<!DOCTYPE plist PUBLIC "-//Apple//DTD PLIST 1.0//EN" "http://www.apple.com/DTDs/PropertyList-1.0.dtd">
<plist version="1.0">
<dict>
${body}
</dict>
</plist>
`;
}

/**
 * `<Name>.app`, optionally signed and wrapped in a compressed disk image.
 */
export class MacosPackager extends BasePackager {
  readonly os = "macos" as const;

  plannedArtifact(target: BuildTarget, outputDir: string): { kind: ArtifactKind; path: string } {
    return this.app.dmg
      ? { kind: "disk_image", path: join(outputDir, this.diskImageName(target)) }
      : { kind: "app_bundle", path: join(outputDir, `${this.app.productName}.app`) };
  }

  protected async assemble(job: PackagingJob): Promise<AssembledArtifact> {
    const appPath = join(job.workDir, `${this.app.productName}.app`);
    const contents = join(appPath, "Contents");
    const resources = join(contents, "Resources");
    mkdirSync(resources, { recursive: true });

    await this.compileExecutable(job, join(contents, "MacOS", this.app.appId));

    let iconFile: string | undefined;
    if (this.app.icon) {
      iconFile = `${this.app.appId}${extname(this.app.icon) || ".icns"}`;
      copyFileSync(this.app.icon, join(resources, iconFile));
    }
    writeFileSync(join(contents, "Info.plist"), renderInfoPlist(this.app, this.app.appId, iconFile));

    if (this.app.signIdentity) {
      await this.runTool(
        "codesign",
        ["--force", "--deep", "--options", "runtime", "--sign", this.app.signIdentity, appPath],
        `${this.app.productName}.app`,
      );
    }

    if (!this.app.dmg) {
      return { kind: "app_bundle", path: appPath };
    }

    // The image opens to the app next to a link to /Applications
    const staging = join(job.workDir, "dmg");
    mkdirSync(staging, { recursive: true });
    renameSync(appPath, join(staging, `${this.app.productName}.app`));
    symlinkSync("/Applications", join(staging, "Applications"));

    const image = join(job.workDir, this.diskImageName(job.target));
    await this.runTool(
      "hdiutil",
      ["create", "-volname", this.app.productName, "-srcfolder", staging, "-ov", "-format", "UDZO", image],
      this.diskImageName(job.target),
    );
    return { kind: "disk_image", path: image };
  }

  private diskImageName(target: BuildTarget): string {
    return `${artifactBaseName(this.app.productName)}-${this.app.version}-${target.arch}.dmg`;
  }
}
