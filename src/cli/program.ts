import path from 'path';
import { Command, InvalidArgumentError } from 'commander';
import { buildGraph } from './graphBuilder';
import { formatImportCounts, getImportCounts, toSnapshot } from './report';
import { startServer } from './server';
import { BuildOptions, BuildWarning, DEFAULT_IMPORT_MARKER, DEFAULT_PORT, parseExtensions, parsePort } from './options';

interface ScanFlags {
  ext?: string[];
  marker: string;
  ignore: boolean;
  skipUnreadable?: boolean;
  verbose?: boolean;
}

interface ReportFlags extends ScanFlags {
  json?: boolean;
}

interface ServeFlags extends ScanFlags {
  port: number;
}

// commander 向けにエラー型を変換
const asArgument =
  <T>(parse: (value: string) => T) =>
  (value: string): T => {
    try {
      return parse(value);
    } catch (error) {
      throw new InvalidArgumentError(error instanceof Error ? error.message : String(error));
    }
  };

const withScanOptions = (command: Command): Command =>
  command
    .option('--ext <extensions>', 'comma-separated source file extensions (default: .zig)', asArgument(parseExtensions))
    .option('--marker <text>', 'text that precedes a quoted import target', DEFAULT_IMPORT_MARKER)
    .option('--no-ignore', 'do not apply .gitignore and the default excludes')
    .option('--skip-unreadable', 'skip files that cannot be read instead of failing')
    .option('--verbose', 'print every file read and every import found');

const toBuildOptions = (flags: ScanFlags): BuildOptions => ({
  extensions: flags.ext,
  marker: flags.marker,
  ignore: flags.ignore,
  skipUnreadable: flags.skipUnreadable,
  log: flags.verbose ? (line) => console.error(line) : undefined,
  onWarning: ({ filePath, error }: BuildWarning) => console.error(`Skipped ${filePath}: ${error.message}`),
});

const fail = (error: unknown): never => {
  console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
  process.exit(1);
};

/**
 * depgraph の commander プログラムを組み立てる (parse はしない)
 */
export const createProgram = (): Command => {
  const program = new Command();

  program.name('depgraph').description('Build an import dependency graph from a source tree').version('0.1.0');

  withScanOptions(
    program
      .command('report')
      .description('Print how many modules each file imports')
      .argument('[dir]', 'root directory to scan', '.')
      .option('--json', 'print the whole graph as JSON')
  ).action((dir: string, flags: ReportFlags) => {
    try {
      const graph = buildGraph(path.resolve(dir), toBuildOptions(flags));
      if (flags.json) {
        console.log(JSON.stringify(toSnapshot(graph), null, 2));
      } else {
        console.log(formatImportCounts(getImportCounts(graph)));
      }
    } catch (error) {
      fail(error);
    }
  });

  withScanOptions(
    program
      .command('serve')
      .description('Serve the dependency graph as JSON for a visualization front end')
      .argument('[dir]', 'root directory to scan', '.')
      .option('--port <number>', 'port to listen on', asArgument(parsePort), DEFAULT_PORT)
  ).action((dir: string, flags: ServeFlags) => {
    const rootDir = path.resolve(dir);
    console.log(`Starting depgraph for ${rootDir}...`);
    startServer(rootDir, { ...toBuildOptions(flags), port: flags.port }).on('error', fail);
  });

  return program;
};
