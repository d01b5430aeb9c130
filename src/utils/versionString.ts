import * as fs from "node:fs";
import * as path from "node:path";
import { getPackageRootDir } from "./templates";

export type PackageInfoLike = {
  name: string;
  version: string | null;
};

function readPackageJson(): unknown {
  const packageJsonPath = path.join(getPackageRootDir(), "package.json");
  return JSON.parse(fs.readFileSync(packageJsonPath, "utf-8"));
}

export function getPackageInfo(): PackageInfoLike {
  const data = readPackageJson();
  if (typeof data !== "object" || data === null) {
    return { name: "commentblocks", version: null };
  }
  const name = "name" in data && typeof data.name === "string" ? data.name : "commentblocks";
  const version = "version" in data && typeof data.version === "string" ? data.version : null;
  return { name, version };
}

// Version tag is like:
// - v1.2.0
// - unknown
export function getVersionTag(info: PackageInfoLike): string {
  if (!info.version) return "unknown";
  return `v${info.version}`;
}

// Example: "commentblocks v1.2.0"
export function getAppVersionString(info: PackageInfoLike = getPackageInfo()): string {
  return `${info.name} ${getVersionTag(info)}`;
}
