import { posix } from "node:path";
import type { ReferenceKind, ResolvedReference } from "../types";

/**
 * Prefix of the canonical path given to relative references that climb above the project root.
 */
export const INVALID_MARKER = "invalid:";

const EXTERNAL = /^(?:https?|ftp):\/\//i;
const MAILTO = /^mailto:/i;
/** Written by authors regardless of where the corpus directory lives. */
const LITERAL_ROOT = "/docs/";

export interface ResolveOptions {
  /** Corpus directory relative to the project root, e.g. `docs`. */
  docsDir: string;
  /** Existence check for a project-relative path; called on every resolution, never cached. */
  exists: (projectPath: string) => boolean;
}

/**
 * Classifies a raw link target without touching the filesystem.
 */
export function classifyReference(reference: string): ReferenceKind {
  if (EXTERNAL.test(reference) || MAILTO.test(reference)) return "external";
  if (reference.startsWith("#")) return "anchor-only";
  if (reference.startsWith("/")) return "rooted";
  if (reference.startsWith("./")) return "dot-relative";
  return "relative";
}

/**
 * Resolves a link target written in `fromPath` to a canonical project-relative path.
 *
 * Order matters: external and anchor-only targets are never resolved; `/docs/...` and
 * `/<docsDir>/...` map onto the corpus directory; any other rooted target is assumed to have omitted the corpus segment;
 * `../`, `./` and bare targets resolve against the referring document's directory.
 */
export function resolveReference(
  reference: string,
  fromPath: string,
  options: ResolveOptions,
): ResolvedReference {
  const kind = classifyReference(reference);
  if (kind === "external" || kind === "anchor-only") {
    return { kind, resolved: null, exists: false };
  }

  const target = decodeTarget(stripFragment(reference));
  const directory = posix.dirname(fromPath);
  const rootedPrefix = [`/${options.docsDir}/`, LITERAL_ROOT].find((prefix) =>
    target.startsWith(prefix),
  );
  let joined: string;
  if (rootedPrefix) {
    joined = `${options.docsDir}/${target.slice(rootedPrefix.length)}`;
  } else if (target.startsWith("/")) {
    joined = `${options.docsDir}${target}`;
  } else if (target.startsWith("./")) {
    joined = posix.join(directory, target.slice(2));
  } else {
    joined = posix.join(directory, target);
  }

  const resolved = canonicalize(joined);
  if (resolved === null) {
    return { kind, resolved: `${INVALID_MARKER}${reference}`, exists: false };
  }
  return { kind, resolved, exists: options.exists(resolved) };
}

export function isInvalidTarget(resolved: string): boolean {
  return resolved.startsWith(INVALID_MARKER);
}

/**
 * Rewrites a project-relative document path as a rooted `/docs/...` reference.
 */
export function toRootedReference(projectPath: string, docsDir: string): string {
  const prefix = `${docsDir}/`;
  const inside = projectPath.startsWith(prefix)
    ? projectPath.slice(prefix.length)
    : projectPath;
  return `/${docsDir}/${inside}`;
}

function stripFragment(reference: string): string {
  const cut = reference.search(/[?#]/);
  return cut === -1 ? reference : reference.slice(0, cut);
}

function decodeTarget(target: string): string {
  try {
    return decodeURI(target);
  } catch {
    return target;
  }
}

function canonicalize(joined: string): string | null {
  const normalized = posix.normalize(joined).replace(/\/+$/, "");
  if (normalized === ".." || normalized.startsWith("../")) return null;
  return normalized.replace(/^\.\//, "");
}
