// import 文の直前に現れる固定文字列
export const DEFAULT_IMPORT_MARKER = '@import("';

// 解析対象の拡張子
export const DEFAULT_EXTENSIONS = ['.zig'];

// 常に無視するディレクトリ
export const ALWAYS_IGNORED = ['node_modules', '.git', 'dist', 'zig-cache', '.zig-cache', 'zig-out'];

export const DEFAULT_PORT = 5554;

export const DEFAULT_CACHE_TTL = 30000; // 30秒

export interface ScanOptions {
  extensions?: string[];
  // false で .gitignore と既定の除外を無効化
  ignore?: boolean;
}

export interface BuildWarning {
  filePath: string;
  error: Error;
}

export interface BuildOptions extends ScanOptions {
  marker?: string;
  // true なら読めないファイルを飛ばして警告にする
  skipUnreadable?: boolean;
  log?: (line: string) => void;
  onWarning?: (warning: BuildWarning) => void;
}

/**
 * "ts, .tsx" のような CLI 引数を拡張子リストに変換
 */
export const parseExtensions = (value: string): string[] => {
  const extensions = value
    .split(',')
    .map((ext) => ext.trim())
    .filter((ext) => ext.length > 0)
    .map((ext) => (ext.startsWith('.') ? ext : `.${ext}`));

  if (extensions.length === 0) {
    throw new Error(`No extensions in "${value}"`);
  }
  return extensions;
};

export const parsePort = (value: string): number => {
  const port = Number(value);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new Error(`Invalid port: ${value}`);
  }
  return port;
};
