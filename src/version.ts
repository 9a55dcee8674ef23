/**
 * version.ts — Version management
 *
 * Reads the version from package.json and bumps it for releases
 * (`ca-bridge bump patch|minor|major`).
 */

import { readFileSync, writeFileSync } from "node:fs";
import { resolve, dirname } from "node:path";
import { fileURLToPath } from "node:url";

// ─── Paths ──────────────────────────────────────────────

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
export const PKG_PATH = resolve(__dirname, "..", "package.json");

// ─── Types ──────────────────────────────────────────────

export const BUMP_TYPES = ["major", "minor", "patch"] as const;

export type BumpType = (typeof BUMP_TYPES)[number];

export function isBumpType(s: string): s is BumpType {
  return BUMP_TYPES.some((t) => t === s);
}

// ─── Version Utilities ──────────────────────────────────

function readPackage(pkgPath: string): Record<string, unknown> {
  const pkg: unknown = JSON.parse(readFileSync(pkgPath, "utf-8"));
  if (typeof pkg !== "object" || pkg === null || Array.isArray(pkg)) {
    throw new Error(`${pkgPath} does not contain a JSON object`);
  }
  return { ...pkg };
}

/** Read current version from package.json */
export function getCurrentVersion(pkgPath: string = PKG_PATH): string {
  try {
    const { version } = readPackage(pkgPath);
    return typeof version === "string" && version ? version : "0.0.0";
  } catch {
    return "0.0.0";
  }
}

/**
 * Bump a MAJOR.MINOR.PATCH version. A major bump resets minor and patch;
 * a minor bump resets patch.
 */
export function bumpVersion(version: string, bumpType: string): string {
  const match = /^(\d+)\.(\d+)\.(\d+)$/.exec(version.trim());
  if (!match) {
    throw new Error(`Invalid version "${version}". Expected MAJOR.MINOR.PATCH.`);
  }
  let [major, minor, patch] = [Number(match[1]), Number(match[2]), Number(match[3])];

  switch (bumpType) {
    case "major":
      major += 1;
      minor = 0;
      patch = 0;
      break;
    case "minor":
      minor += 1;
      patch = 0;
      break;
    case "patch":
      patch += 1;
      break;
    default:
      throw new Error(`Invalid bump type: ${bumpType}. Use 'major', 'minor', or 'patch'.`);
  }

  return `${major}.${minor}.${patch}`;
}

/**
 * Write `newVersion` into package.json and return the version it replaced.
 * Other fields and their order are left untouched.
 */
export function updatePackageVersion(newVersion: string, pkgPath: string = PKG_PATH): string {
  const pkg = readPackage(pkgPath);
  const old = typeof pkg.version === "string" ? pkg.version : "0.0.0";
  pkg.version = newVersion;
  writeFileSync(pkgPath, JSON.stringify(pkg, null, 2) + "\n");
  return old;
}
