import { DependencyGraph, GraphSnapshot, ImportCountRow, NodeId, SnapshotNode } from '../shared/graph';

const compareIds = (a: NodeId, b: NodeId): number => (a < b ? -1 : a > b ? 1 : 0);

/**
 * モジュールごとの import 数 (多い順、同数なら ID 順)
 */
export const getImportCounts = (graph: DependencyGraph): ImportCountRow[] => {
  return Array.from(graph.getAllNodes(), (id) => ({ id, importCount: graph.getImportCount(id) })).sort(
    (a, b) => b.importCount - a.importCount || compareIds(a.id, b.id)
  );
};

export const describeNode = (graph: DependencyGraph, id: NodeId): SnapshotNode => ({
  id,
  importCount: graph.getImportCount(id),
  importedBy: Array.from(graph.getAdjacentNodes(id)).sort(compareIds),
});

/**
 * 描画側に渡す JSON 形式のグラフ
 */
export const toSnapshot = (graph: DependencyGraph): GraphSnapshot => {
  const ids = Array.from(graph.getAllNodes()).sort(compareIds);
  const nodes = ids.map((id) => describeNode(graph, id));
  const edges = nodes.flatMap((node) => node.importedBy.map((to) => ({ from: node.id, to })));
  return { nodes, edges };
};

export const formatImportCounts = (rows: ImportCountRow[]): string => {
  if (rows.length === 0) {
    return 'No modules found.';
  }

  const idWidth = Math.max('module'.length, ...rows.map((row) => row.id.length));
  const lines = [`${'module'.padEnd(idWidth)}  imports`];
  for (const row of rows) {
    lines.push(`${row.id.padEnd(idWidth)}  ${row.importCount}`);
  }
  return lines.join('\n');
};
