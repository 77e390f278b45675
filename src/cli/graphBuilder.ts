import fs from 'fs';
import path from 'path';
import { NodeId } from '../shared/graph';
import { DepgraphError, MalformedImportError, NormalizationError, ReadError } from '../shared/errors';
import { ImportGraph } from './dependencyGraph';
import { extractImports } from './importExtractor';
import { normalizePath } from './pathNormalizer';
import { scanSourceFiles } from './scanner';
import { BuildOptions } from './options';

/**
 * ファイル全体を読み込む
 * stat のサイズより少なくしか読めなかった場合も ReadError
 */
export const readSourceFile = (filePath: string): Buffer => {
  let fd: number;
  try {
    fd = fs.openSync(filePath, 'r');
  } catch (error) {
    throw new ReadError(filePath, 'cannot open file', { cause: error });
  }

  try {
    const size = fs.fstatSync(fd).size;
    const buffer = Buffer.alloc(size);
    let bytesRead = 0;
    while (bytesRead < size) {
      const chunk = fs.readSync(fd, buffer, bytesRead, size - bytesRead, bytesRead);
      if (chunk === 0) break;
      bytesRead += chunk;
    }
    if (bytesRead !== size) {
      throw new ReadError(filePath, `read ${bytesRead} of ${size} bytes`);
    }
    return buffer;
  } catch (error) {
    if (error instanceof ReadError) throw error;
    throw new ReadError(filePath, 'read failed', { cause: error });
  } finally {
    fs.closeSync(fd);
  }
};

interface FileImports {
  file: NodeId;
  imports: NodeId[];
  // 飛ばした import ごとのエラー
  problems: DepgraphError[];
}

// グラフに触れる前に 1 ファイル分の解析を終わらせる
// 不正な import はその 1 件だけ飛ばし、閉じていないマーカー以降は読まない
const analyzeFile = (content: Buffer, relativePath: string, marker?: string): FileImports => {
  const file = normalizePath(relativePath);
  const raws: string[] = [];
  const problems: DepgraphError[] = [];

  try {
    for (const raw of extractImports(content, marker)) {
      raws.push(raw);
    }
  } catch (error) {
    if (!(error instanceof MalformedImportError)) throw error;
    problems.push(error);
  }

  const imports: NodeId[] = [];
  for (const raw of raws) {
    try {
      imports.push(normalizePath(raw));
    } catch (error) {
      if (!(error instanceof NormalizationError)) throw error;
      problems.push(error);
    }
  }

  return { file, imports, problems };
};

/**
 * ルート以下の全ソースファイルから依存グラフを構築
 *
 * 辺は「import される側 → import する側」の向きで追加する。
 * getAdjacentNodes(m) は m を import しているファイル、
 * getImportCount(f) は f が import している異なるモジュールの数になる。
 */
export const buildGraph = (rootDir: string, options: BuildOptions = {}): ImportGraph => {
  const graph = new ImportGraph();
  const log = options.log;

  for (const relativePath of scanSourceFiles(rootDir, options)) {
    log?.(`reading file ${relativePath}`);

    let content: Buffer;
    try {
      content = readSourceFile(path.join(rootDir, relativePath));
    } catch (error) {
      if (!(error instanceof ReadError) || !options.skipUnreadable) throw error;
      options.onWarning?.({ filePath: relativePath, error });
      continue;
    }

    if (content.length === 0) continue;

    const analyzed = analyzeFile(content, relativePath, options.marker);
    for (const error of analyzed.problems) {
      options.onWarning?.({ filePath: relativePath, error });
    }

    graph.addNode(analyzed.file);
    for (const imported of analyzed.imports) {
      log?.(`${analyzed.file} imports ${imported}`);
      graph.addEdge(imported, analyzed.file);
    }
  }

  return graph;
};
