import type { FileType } from "./types.js";

export const ASSET_MANIFEST = "Microsoft.VisualStudio.Code.Manifest";
export const ASSET_DETAILS = "Microsoft.VisualStudio.Services.Content.Details";
export const ASSET_CHANGELOG = "Microsoft.VisualStudio.Services.Content.Changelog";
export const ASSET_LICENSE = "Microsoft.VisualStudio.Services.Content.License";
export const ASSET_ICON = "Microsoft.VisualStudio.Services.Icons.Default";
export const ASSET_VSIX = "Microsoft.VisualStudio.Services.VSIXPackage";
export const ASSET_VSIX_MANIFEST = "Microsoft.VisualStudio.Services.VsixManifest";
export const ASSET_SIGNATURE = "Microsoft.VisualStudio.Services.VsixSignature";
export const ASSET_PUBLIC_KEY = "Microsoft.VisualStudio.Services.PublicKey";
export const ASSET_WEB_RESOURCES = "Microsoft.VisualStudio.Code.WebResources";

/** Web resources are only served from inside the packaged extension folder. */
export const WEB_RESOURCE_ROOT = "extension/";

const FILE_TYPE_BY_ASSET = new Map<string, FileType>([
  [ASSET_MANIFEST, "manifest"],
  [ASSET_DETAILS, "readme"],
  [ASSET_CHANGELOG, "changelog"],
  [ASSET_LICENSE, "license"],
  [ASSET_ICON, "icon"],
  [ASSET_VSIX, "download"],
  [ASSET_VSIX_MANIFEST, "vsixmanifest"],
  [ASSET_SIGNATURE, "download-sig"],
]);

/** File types listed in query results, in the order the `files` array uses. */
export const QUERY_FILE_TYPES: readonly FileType[] = [
  "manifest",
  "readme",
  "license",
  "icon",
  "download",
  "changelog",
  "vsixmanifest",
  "download-sig",
];

export function fileTypeForAsset(assetType: string): FileType | null {
  return FILE_TYPE_BY_ASSET.get(assetType) ?? null;
}

export function assetTypeForFile(type: FileType): string | null {
  for (const [assetType, fileType] of FILE_TYPE_BY_ASSET) {
    if (fileType === type) {
      return assetType;
    }
  }

  return null;
}

export type AssetRequest =
  | { kind: "file"; assetType: string; fileType: FileType }
  | { kind: "public-key" }
  | { kind: "web-resource"; path: string }
  | { kind: "unknown"; assetType: string };

/**
 * Classifies the `{assetType}[/**]` tail of an asset URL.
 */
export function parseAssetRequest(assetPath: string): AssetRequest {
  const webPrefix = `${ASSET_WEB_RESOURCES}/`;
  if (assetPath.startsWith(webPrefix)) {
    return { kind: "web-resource", path: assetPath.slice(webPrefix.length) };
  }

  if (assetPath === ASSET_PUBLIC_KEY) {
    return { kind: "public-key" };
  }

  const fileType = fileTypeForAsset(assetPath);
  if (fileType === null) {
    return { kind: "unknown", assetType: assetPath };
  }

  return { kind: "file", assetType: assetPath, fileType };
}
