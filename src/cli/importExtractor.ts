import { TextDecoder } from 'util';
import { MalformedImportError } from '../shared/errors';
import { DEFAULT_IMPORT_MARKER } from './options';

const QUOTE = 0x22; // '"'

// 不正なバイト列を U+FFFD に置き換えず失敗させる
const decoder = new TextDecoder('utf-8', { fatal: true });

/**
 * ファイル内容からマーカーに続く import 文字列を出現順に取り出す
 *
 * 構文解析はしないので、コメントや文字列リテラル内のマーカーも import として扱う。
 * 閉じ引用符がないまま終端に達した場合や、import 先が UTF-8 として不正な場合は
 * MalformedImportError を投げる。
 */
export const extractImports = (
  content: Buffer | string,
  marker: string = DEFAULT_IMPORT_MARKER
): Iterable<string> => {
  if (marker.length === 0) {
    throw new TypeError('Import marker must not be empty');
  }

  const buffer = typeof content === 'string' ? Buffer.from(content, 'utf-8') : content;
  const needle = Buffer.from(marker, 'utf-8');

  // 呼び出しごとに独立した走査を返す
  return {
    *[Symbol.iterator]() {
      let cursor = 0;
      while (cursor < buffer.length) {
        const markerAt = buffer.indexOf(needle, cursor);
        if (markerAt === -1) return;

        const start = markerAt + needle.length;
        const end = buffer.indexOf(QUOTE, start);
        if (end === -1) {
          throw new MalformedImportError(markerAt);
        }

        let target: string;
        try {
          target = decoder.decode(buffer.subarray(start, end));
        } catch {
          throw new MalformedImportError(markerAt, 'Invalid UTF-8 in import');
        }
        yield target;
        cursor = end + 1;
      }
    },
  };
};
