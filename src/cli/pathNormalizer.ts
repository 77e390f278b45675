import path from 'path';
import { NodeId } from '../shared/graph';
import { NormalizationError } from '../shared/errors';

/**
 * ファイルパスや import 文字列をノード ID に変換
 * 拡張子を除き、末尾 2 階層を "dir/file" の形で残す
 */
export const normalizePath = (rawPath: string): NodeId => {
  const components = rawPath
    .split(/[\\/]/)
    .filter((component) => component !== '' && component !== '.');

  if (components.length === 0) {
    throw new NormalizationError(rawPath);
  }

  const last = components[components.length - 1];
  const stem = last.slice(0, last.length - path.extname(last).length);

  if (components.length === 1) {
    return stem;
  }
  return `${components[components.length - 2]}/${stem}`;
};
