import { DependencyGraph, NodeId } from '../shared/graph';
import { NormalizationError } from '../shared/errors';

const EMPTY: ReadonlySet<NodeId> = new Set();

/**
 * 隣接集合と入次数カウンタを持つ有向グラフ
 *
 * カウンタは重複しない辺が初めて追加されたときだけ増える。
 * removeNode / removeEdge はカウンタを調整しないので、
 * 構造を編集した後は recomputeImportCounts() で数え直す。
 */
export class ImportGraph implements DependencyGraph {
  private readonly adjacency = new Map<NodeId, Set<NodeId>>();
  private readonly importCounts = new Map<NodeId, number>();

  get nodeCount(): number {
    return this.adjacency.size;
  }

  get edgeCount(): number {
    let count = 0;
    for (const targets of this.adjacency.values()) {
      count += targets.size;
    }
    return count;
  }

  addNode(id: NodeId): void {
    if (id === '') {
      throw new NormalizationError(id);
    }
    if (!this.adjacency.has(id)) {
      this.adjacency.set(id, new Set());
      this.importCounts.set(id, 0);
    }
  }

  addEdge(from: NodeId, to: NodeId): void {
    this.addNode(from);
    this.addNode(to);

    const targets = this.successors(from);
    if (targets.has(to)) return;

    targets.add(to);
    this.importCounts.set(to, this.getImportCount(to) + 1);
  }

  removeNode(id: NodeId): void {
    this.adjacency.delete(id);
    this.importCounts.delete(id);

    for (const targets of this.adjacency.values()) {
      targets.delete(id);
    }
  }

  removeEdge(from: NodeId, to: NodeId): void {
    this.adjacency.get(from)?.delete(to);
  }

  getImportCount(id: NodeId): number {
    return this.importCounts.get(id) ?? 0;
  }

  getAdjacentNodes(id: NodeId): ReadonlySet<NodeId> {
    return this.adjacency.get(id) ?? EMPTY;
  }

  getAllNodes(): IterableIterator<NodeId> {
    return this.adjacency.keys();
  }

  hasNode(id: NodeId): boolean {
    return this.adjacency.has(id);
  }

  hasEdge(from: NodeId, to: NodeId): boolean {
    return this.adjacency.get(from)?.has(to) ?? false;
  }

  /**
   * 現在の辺集合から全ノードの入次数を数え直す
   */
  recomputeImportCounts(): void {
    for (const id of this.adjacency.keys()) {
      this.importCounts.set(id, 0);
    }
    for (const targets of this.adjacency.values()) {
      for (const to of targets) {
        this.importCounts.set(to, this.getImportCount(to) + 1);
      }
    }
  }

  private successors(id: NodeId): Set<NodeId> {
    const targets = this.adjacency.get(id);
    if (!targets) {
      throw new Error(`Unknown node: ${id}`);
    }
    return targets;
  }
}
