/**
 * Directed include graph between document URIs (parent includes child).
 */
export class ProjectGraph {
  private readonly parents = new Map<string, Set<string>>();
  private readonly children = new Map<string, Set<string>>();

  /** Idempotent. */
  registerDependency(parentUri: string, childUri: string): void {
    link(this.parents, childUri, parentUri);
    link(this.children, parentUri, childUri);
  }

  parentsOf(uri: string): string[] {
    return [...(this.parents.get(uri) ?? [])].sort();
  }

  childrenOf(uri: string): string[] {
    return [...(this.children.get(uri) ?? [])].sort();
  }

  /**
   * BFS distance from `uri` (distance 0) to every ancestor reachable through child→parent edges.
   */
  ancestorDistances(uri: string): Map<string, number> {
    const distances = new Map<string, number>([[uri, 0]]);
    const queue = [uri];
    for (let head = 0; head < queue.length; head++) {
      const current = queue[head];
      if (current === undefined) break;
      const depth = distances.get(current) ?? 0;
      for (const parent of this.parents.get(current) ?? []) {
        if (distances.has(parent)) continue;
        distances.set(parent, depth + 1);
        queue.push(parent);
      }
    }
    return distances;
  }

  /**
   * Choose the assembler entry point for `uri`.
   *
   * Candidates are `uri` (distance 0) and its ancestors. The nearest preferred root wins;
   * otherwise the nearest candidate with no parents; otherwise `uri` itself. Equal distances go
   * to the lexicographically smallest URI.
   */
  selectRoot(uri: string, preferredRoots: ReadonlySet<string>): string {
    const distances = this.ancestorDistances(uri);
    if (distances.size === 1) return uri;

    const preferred = [...distances].filter(([candidate]) => preferredRoots.has(candidate));
    const fromPreferred = pickNearest(preferred);
    if (fromPreferred !== undefined) return fromPreferred;

    const trueRoots = [...distances].filter(([candidate]) => (this.parents.get(candidate)?.size ?? 0) === 0);
    return pickNearest(trueRoots) ?? uri;
  }
}

function link(map: Map<string, Set<string>>, from: string, to: string): void {
  let set = map.get(from);
  if (set === undefined) {
    set = new Set();
    map.set(from, set);
  }
  set.add(to);
}

function pickNearest(candidates: Array<[uri: string, distance: number]>): string | undefined {
  let best: [string, number] | undefined;
  for (const candidate of candidates) {
    if (
      best === undefined ||
      candidate[1] < best[1] ||
      (candidate[1] === best[1] && candidate[0] < best[0])
    ) {
      best = candidate;
    }
  }
  return best?.[0];
}
