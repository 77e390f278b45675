/**
 * Tests for the textual import scan
 */

import { extractImports } from '../cli/importExtractor';
import { MalformedImportError } from '../shared/errors';

describe('extractImports', () => {
  it('returns import targets in source order', () => {
    const source = ['const std = @import("std");', 'const graph = @import("graph/graph.zig");'].join('\n');
    expect(Array.from(extractImports(source))).toEqual(['std', 'graph/graph.zig']);
  });

  it('keeps duplicates as separate entries', () => {
    const source = '@import("a") @import("b") @import("a")';
    expect(Array.from(extractImports(source))).toEqual(['a', 'b', 'a']);
  });

  it('treats markers inside comments as imports', () => {
    const source = '// old: @import("ghost")\nconst real = @import("real");';
    expect(Array.from(extractImports(source))).toEqual(['ghost', 'real']);
  });

  it('returns nothing for empty content', () => {
    expect(Array.from(extractImports(Buffer.alloc(0)))).toEqual([]);
    expect(Array.from(extractImports('no imports here'))).toEqual([]);
  });

  it('decodes buffers as UTF-8', () => {
    const content = Buffer.from('const m = @import("módulo.zig");', 'utf-8');
    expect(Array.from(extractImports(content))).toEqual(['módulo.zig']);
  });

  it('yields an empty string for an empty target', () => {
    expect(Array.from(extractImports('@import("")'))).toEqual(['']);
  });

  it('can be iterated more than once', () => {
    const imports = extractImports('@import("a") @import("b")');
    expect(Array.from(imports)).toEqual(['a', 'b']);
    expect(Array.from(imports)).toEqual(['a', 'b']);
  });

  it('supports a custom marker', () => {
    const source = 'const a = require("./a");\nconst b = require("./b");';
    expect(Array.from(extractImports(source, 'require("'))).toEqual(['./a', './b']);
  });

  it('rejects an empty marker', () => {
    expect(() => extractImports('@import("a")', '')).toThrow(TypeError);
  });

  describe('unterminated imports', () => {
    it('yields the preceding imports and then throws', () => {
      const seen: string[] = [];
      expect(() => {
        for (const target of extractImports('@import("a") @import("b')) {
          seen.push(target);
        }
      }).toThrow(MalformedImportError);
      expect(seen).toEqual(['a']);
    });

    it('reports the byte offset of the marker', () => {
      let caught: unknown;
      try {
        Array.from(extractImports('x @import("open'));
      } catch (error) {
        caught = error;
      }
      expect(caught).toBeInstanceOf(MalformedImportError);
      expect(caught).toMatchObject({ kind: 'malformed-import', offset: 2 });
    });

    it('rejects a target that is not valid UTF-8', () => {
      const content = Buffer.concat([
        Buffer.from('@import("ok") @import("', 'utf-8'),
        Buffer.from([0x61, 0xff, 0x62]),
        Buffer.from('")', 'utf-8'),
      ]);
      const seen: string[] = [];
      expect(() => {
        for (const target of extractImports(content)) {
          seen.push(target);
        }
      }).toThrow('Invalid UTF-8 in import at byte 14');
      expect(seen).toEqual(['ok']);
    });

    it('handles a marker at the very end of the content', () => {
      expect(() => Array.from(extractImports('foo @import("'))).toThrow('Unterminated import at byte 4');
    });
  });
});
