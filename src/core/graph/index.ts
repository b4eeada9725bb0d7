import { posix } from "node:path";
import {
  isInvalidTarget,
  resolveReference,
  type ResolveOptions,
} from "../links/resolver";
import type {
  BrokenEdge,
  DocumentGraph,
  ReferenceEdge,
  ReferenceKind,
  ReferenceOrigin,
} from "../types";

export interface GraphDocument {
  path: string;
  references: ReadonlyArray<{ target: string; origin: ReferenceOrigin }>;
}

const ENTRY_POINT = "readme.md";

/**
 * Code-point ordering for project paths, independent of the host locale.
 */
export function comparePaths(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

export function isEntryPoint(path: string): boolean {
  return posix.basename(path).toLowerCase() === ENTRY_POINT;
}

function ensureSet(map: Map<string, Set<string>>, key: string): Set<string> {
  let bucket = map.get(key);
  if (!bucket) {
    bucket = new Set<string>();
    map.set(key, bucket);
  }
  return bucket;
}

function emptyReferenceCounts(): Record<ReferenceKind, number> {
  return {
    relative: 0,
    "dot-relative": 0,
    rooted: 0,
    external: 0,
    "anchor-only": 0,
  };
}

/**
 * Builds the reference graph in one pass over every document's references.
 *
 * Edges to external and anchor-only targets are counted but never enter the graph. An internal
 * edge is broken when its target is neither a scanned document nor an existing file; targets
 * that climb above the project root are broken with reason `unresolvable`. A document is an orphan
 * when its reverse-index entry is empty; README files are entry points and never orphans. Cycles
 * and self-links are valid.
 */
export function buildDocumentGraph(
  documents: readonly GraphDocument[],
  options: ResolveOptions,
): DocumentGraph {
  const nodes = documents.map((document) => document.path).sort(comparePaths);
  const nodeSet = new Set(nodes);
  const adjacency = new Map<string, Set<string>>();
  const reverse = new Map<string, Set<string>>();
  const edges: ReferenceEdge[] = [];
  const broken: BrokenEdge[] = [];
  const referenceCounts = emptyReferenceCounts();

  for (const node of nodes) {
    adjacency.set(node, new Set());
    reverse.set(node, new Set());
  }

  const ordered = [...documents].sort((a, b) => comparePaths(a.path, b.path));
  for (const document of ordered) {
    for (const reference of document.references) {
      const resolution = resolveReference(
        reference.target,
        document.path,
        options,
      );
      referenceCounts[resolution.kind] += 1;
      const { kind, resolved } = resolution;
      if (kind === "external" || kind === "anchor-only" || resolved === null) {
        continue;
      }

      const edge: ReferenceEdge = {
        source: document.path,
        target: reference.target,
        origin: reference.origin,
        kind,
        resolved,
        exists: resolution.exists,
      };
      edges.push(edge);

      if (isInvalidTarget(resolved)) {
        broken.push({ ...edge, kind, resolved, reason: "unresolvable" });
        continue;
      }
      ensureSet(adjacency, document.path).add(resolved);
      ensureSet(reverse, resolved).add(document.path);
      if (!nodeSet.has(resolved) && !resolution.exists) {
        broken.push({ ...edge, kind, resolved, reason: "missing" });
      }
    }
  }

  const orphans = nodes.filter((node) => {
    if (isEntryPoint(node)) return false;
    const sources = reverse.get(node);
    return !sources || sources.size === 0;
  });

  return { nodes, edges, adjacency, reverse, orphans, broken, referenceCounts };
}

/**
 * Documents reachable from `start` by following internal edges, `start` included.
 */
export function reachableFrom(graph: DocumentGraph, start: string): Set<string> {
  const visited = new Set<string>();
  if (!graph.adjacency.has(start)) return visited;
  const queue = [start];
  visited.add(start);
  while (queue.length > 0) {
    const current = queue.shift();
    if (current === undefined) break;
    for (const next of graph.adjacency.get(current) ?? []) {
      if (visited.has(next) || !graph.adjacency.has(next)) continue;
      visited.add(next);
      queue.push(next);
    }
  }
  return visited;
}

/**
 * Documents that no README entry point can reach.
 */
export function unreachableDocuments(graph: DocumentGraph): string[] {
  const reached = new Set<string>();
  for (const node of graph.nodes) {
    if (!isEntryPoint(node)) continue;
    for (const path of reachableFrom(graph, node)) reached.add(path);
  }
  return graph.nodes.filter((node) => !reached.has(node));
}
