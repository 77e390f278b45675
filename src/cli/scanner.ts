import fs from 'fs';
import path from 'path';
import ignore from 'ignore';
import { DiscoveryError } from '../shared/errors';
import { ALWAYS_IGNORED, DEFAULT_EXTENSIONS, ScanOptions } from './options';

type Ignore = ReturnType<typeof ignore>;

const readDirectory = (dirPath: string): fs.Dirent[] => {
  try {
    return fs
      .readdirSync(dirPath, { withFileTypes: true })
      .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  } catch (error) {
    throw new DiscoveryError(dirPath, 'directory is not readable', { cause: error });
  }
};

// .gitignore ごとのルールと、その置き場所 (ルートからの相対パス、ルートは '')
interface IgnoreRule {
  base: string;
  ig: Ignore;
}

// .gitignore が読めればルールを 1 段積む。読めなければ親のルールのまま
const withGitignore = (dirPath: string, base: string, rules: IgnoreRule[]): IgnoreRule[] => {
  try {
    const content = fs.readFileSync(path.join(dirPath, '.gitignore'), 'utf-8');
    return [...rules, { base, ig: ignore().add(content) }];
  } catch {
    // .gitignore がない、またはディレクトリなどで読めない
    return rules;
  }
};

// パターンは各 .gitignore の置き場所からの相対パスで照合する
const isIgnored = (rules: IgnoreRule[], relativePath: string): boolean =>
  rules.some(({ base, ig }) => ig.ignores(base === '' ? relativePath : relativePath.slice(base.length + 1)));

function* walk(
  dirPath: string,
  rootPath: string,
  rules: IgnoreRule[] | null,
  extensions: string[]
): Generator<string> {
  // ルートからの相対パス ("/" 区切り)
  const base = path.relative(rootPath, dirPath).split(path.sep).join('/');
  const currentRules = rules ? withGitignore(dirPath, base, rules) : null;

  for (const entry of readDirectory(dirPath)) {
    const fullPath = path.join(dirPath, entry.name);
    const relativePath = base === '' ? entry.name : `${base}/${entry.name}`;

    if (entry.isDirectory()) {
      if (currentRules && isIgnored(currentRules, `${relativePath}/`)) continue;
      yield* walk(fullPath, rootPath, currentRules, extensions);
    } else if (entry.isFile()) {
      // シンボリックリンクやデバイスはここに来ない
      if (currentRules && isIgnored(currentRules, relativePath)) continue;
      if (extensions.includes(path.extname(entry.name))) {
        yield relativePath;
      }
    }
  }
}

/**
 * ルート以下のソースファイルを再帰的に列挙する
 * 返すのはルートからの相対パスで、走査は反復時に遅延して行う
 */
export const scanSourceFiles = (rootPath: string, options: ScanOptions = {}): Iterable<string> => {
  let stats: fs.Stats;
  try {
    stats = fs.statSync(rootPath);
  } catch (error) {
    throw new DiscoveryError(rootPath, 'no such directory', { cause: error });
  }
  if (!stats.isDirectory()) {
    throw new DiscoveryError(rootPath, 'not a directory');
  }

  const extensions = options.extensions ?? DEFAULT_EXTENSIONS;
  const rules = options.ignore === false ? null : [{ base: '', ig: ignore().add(ALWAYS_IGNORED) }];

  return {
    [Symbol.iterator]: () => walk(rootPath, rootPath, rules, extensions),
  };
};
