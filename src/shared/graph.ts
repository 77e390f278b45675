// 正規化済みのモジュール識別子 (例: "graph/graph")
export type NodeId = string;

/**
 * 依存グラフの公開インターフェース
 * 描画側はこの契約だけに依存する
 */
export interface DependencyGraph {
  addNode(id: NodeId): void;
  addEdge(from: NodeId, to: NodeId): void;
  removeNode(id: NodeId): void;
  removeEdge(from: NodeId, to: NodeId): void;
  getImportCount(id: NodeId): number;
  getAdjacentNodes(id: NodeId): ReadonlySet<NodeId>;
  getAllNodes(): IterableIterator<NodeId>;
  hasNode(id: NodeId): boolean;
  hasEdge(from: NodeId, to: NodeId): boolean;
}

// モジュールごとの import 数 (入次数)
export interface ImportCountRow {
  id: NodeId;
  importCount: number;
}

export interface SnapshotNode {
  id: NodeId;
  importCount: number;
  // このモジュールを import しているファイル
  importedBy: NodeId[];
}

// JSON で返すグラフ全体 (edge は import 先 → import 元)
export interface GraphSnapshot {
  nodes: SnapshotNode[];
  edges: Array<{ from: NodeId; to: NodeId }>;
}
