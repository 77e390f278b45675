export { ImportGraph } from './cli/dependencyGraph';
export { buildGraph, readSourceFile } from './cli/graphBuilder';
export { extractImports } from './cli/importExtractor';
export { normalizePath } from './cli/pathNormalizer';
export { scanSourceFiles } from './cli/scanner';
export { describeNode, formatImportCounts, getImportCounts, toSnapshot } from './cli/report';
export { createApp, startServer } from './cli/server';
export type { ServerOptions } from './cli/server';
export * from './cli/options';
export * from './shared/errors';
export * from './shared/graph';
