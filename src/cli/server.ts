import express, { Express } from 'express';
import cors from 'cors';
import { Server } from 'http';
import { buildGraph } from './graphBuilder';
import { ImportGraph } from './dependencyGraph';
import { describeNode, getImportCounts, toSnapshot } from './report';
import { BuildOptions, DEFAULT_CACHE_TTL, DEFAULT_PORT } from './options';

export interface ServerOptions extends BuildOptions {
  port?: number;
  cacheTtl?: number;
}

const errorMessage = (error: unknown): string => (error instanceof Error ? error.message : String(error));

export const createApp = (rootDir: string, options: ServerOptions = {}): Express => {
  const app = express();
  const cacheTtl = options.cacheTtl ?? DEFAULT_CACHE_TTL;

  // 依存グラフのキャッシュ
  let graphCache: ImportGraph | null = null;
  let graphCacheTime = 0;

  const currentGraph = (): ImportGraph => {
    const now = Date.now();

    // キャッシュが有効ならそれを返す
    if (graphCache && now - graphCacheTime < cacheTtl) {
      return graphCache;
    }

    console.log('Scanning dependencies...');
    const graph = buildGraph(rootDir, options);
    graphCache = graph;
    graphCacheTime = now;

    console.log(`Found ${graph.nodeCount} modules and ${graph.edgeCount} imports`);
    return graph;
  };

  app.use(cors());

  // グラフ全体
  app.get('/api/graph', (req, res) => {
    try {
      res.json(toSnapshot(currentGraph()));
    } catch (error) {
      console.error('Error scanning dependencies:', error);
      res.status(500).json({ error: errorMessage(error) });
    }
  });

  // モジュールごとの import 数
  app.get('/api/import-counts', (req, res) => {
    try {
      res.json(getImportCounts(currentGraph()));
    } catch (error) {
      console.error('Error scanning dependencies:', error);
      res.status(500).json({ error: errorMessage(error) });
    }
  });

  // ID は "dir/file" を含むのでクエリで受け取る
  app.get('/api/nodes', (req, res) => {
    const id = req.query.id;
    if (typeof id !== 'string' || id === '') {
      res.status(400).json({ error: 'Missing query parameter: id' });
      return;
    }

    try {
      const graph = currentGraph();
      if (!graph.hasNode(id)) {
        res.status(404).json({ error: `Unknown module: ${id}` });
        return;
      }
      res.json(describeNode(graph, id));
    } catch (error) {
      console.error('Error scanning dependencies:', error);
      res.status(500).json({ error: errorMessage(error) });
    }
  });

  return app;
};

export const startServer = (rootDir: string, options: ServerOptions = {}): Server => {
  const port = options.port ?? DEFAULT_PORT;
  const app = createApp(rootDir, options);

  return app.listen(port, () => {
    console.log(`Server running at http://localhost:${port}`);
  });
};
