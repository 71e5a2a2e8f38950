/**
 * Default version requirement for a new remote dependency, chosen from
 * the tags and branches of its repository.
 */
import { execFileSync } from "node:child_process";
import type { DependencyRequirement } from "./model.js";

export interface SemanticVersion {
  major: number;
  minor: number;
  patch: number;
  prerelease: string[];
  build: string[];
}

const SEMVER = /^v?(\d+)\.(\d+)\.(\d+)(?:-([0-9A-Za-z.-]+))?(?:\+([0-9A-Za-z.-]+))?$/;

export function parseVersion(text: string): SemanticVersion | undefined {
  const m = SEMVER.exec(text.trim());
  if (!m) return undefined;
  return {
    major: Number(m[1]),
    minor: Number(m[2]),
    patch: Number(m[3]),
    prerelease: m[4] ? m[4].split(".") : [],
    build: m[5] ? m[5].split(".") : [],
  };
}

function compareIdentifiers(a: string, b: string): number {
  const an = /^\d+$/.test(a);
  const bn = /^\d+$/.test(b);
  if (an && bn) return Number(a) - Number(b);
  if (an) return -1;
  if (bn) return 1;
  return a < b ? -1 : a > b ? 1 : 0;
}

/** Semantic version precedence; build metadata is ignored. */
export function compareVersions(a: SemanticVersion, b: SemanticVersion): number {
  const core = a.major - b.major || a.minor - b.minor || a.patch - b.patch;
  if (core !== 0) return core;
  if (a.prerelease.length === 0 || b.prerelease.length === 0) {
    return b.prerelease.length - a.prerelease.length;
  }
  const n = Math.min(a.prerelease.length, b.prerelease.length);
  for (let i = 0; i < n; i++) {
    const c = compareIdentifiers(a.prerelease[i], b.prerelease[i]);
    if (c !== 0) return c;
  }
  return a.prerelease.length - b.prerelease.length;
}

export function formatVersion(v: SemanticVersion): string {
  let out = `${v.major}.${v.minor}.${v.patch}`;
  if (v.prerelease.length > 0) out += `-${v.prerelease.join(".")}`;
  if (v.build.length > 0) out += `+${v.build.join(".")}`;
  return out;
}

export interface RemoteRefs {
  tags: string[];
  branches: string[];
}

/** Splits `git ls-remote --tags --heads` output into tag and branch names. */
export function parseLsRemote(output: string): RemoteRefs {
  const tags = new Set<string>();
  const branches = new Set<string>();
  for (const line of output.split(/\r?\n/)) {
    const ref = line.split("\t")[1]?.trim();
    if (!ref) continue;
    if (ref.startsWith("refs/tags/")) {
      tags.add(ref.slice("refs/tags/".length).replace(/\^\{\}$/, ""));
    } else if (ref.startsWith("refs/heads/")) {
      branches.add(ref.slice("refs/heads/".length));
    }
  }
  return { tags: [...tags], branches: [...branches] };
}

function highest(versions: SemanticVersion[]): SemanticVersion | undefined {
  let best: SemanticVersion | undefined;
  for (const v of versions) {
    if (!best || compareVersions(v, best) > 0) best = v;
  }
  return best;
}

/**
 * The highest release tag, else the highest tag of any kind, as an
 * up-to-next-major requirement; without version tags, a branch:
 * `preferredBranch` when it exists, then `main`, else `master`.
 */
export function pickDefaultRequirement(refs: RemoteRefs, preferredBranch?: string): DependencyRequirement {
  const versions = refs.tags.map(parseVersion).filter((v): v is SemanticVersion => v !== undefined);
  const latest = highest(versions.filter((v) => v.prerelease.length === 0)) ?? highest(versions);
  if (latest) return { kind: "upToNextMajor", version: formatVersion(latest) };
  if (preferredBranch !== undefined && refs.branches.includes(preferredBranch)) {
    return { kind: "branch", branch: preferredBranch };
  }
  return { kind: "branch", branch: refs.branches.includes("main") ? "main" : "master" };
}

export interface VersionResolver {
  listRefs(url: string): RemoteRefs;
}

export class VersionLookupError extends Error {
  code = "E_RESOLVE";

  constructor(message: string) {
    super(message);
    this.name = "VersionLookupError";
  }
}

/** Reads refs from the remote with `git ls-remote`. */
export class GitVersionResolver implements VersionResolver {
  constructor(private readonly timeoutMs = 30000) {}

  listRefs(url: string): RemoteRefs {
    try {
      const stdout = execFileSync("git", ["ls-remote", "--tags", "--heads", url], {
        encoding: "utf-8",
        timeout: this.timeoutMs,
        stdio: ["ignore", "pipe", "pipe"],
        maxBuffer: 10 * 1024 * 1024,
      });
      return parseLsRemote(stdout);
    } catch (e) {
      const msg = e instanceof Error ? e.message : String(e);
      throw new VersionLookupError(`could not list versions of '${url}': ${msg}`);
    }
  }
}
