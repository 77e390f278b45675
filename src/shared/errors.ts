export type DepgraphErrorKind = 'discovery' | 'read' | 'malformed-import' | 'normalization';

export class DepgraphError extends Error {
  readonly kind: DepgraphErrorKind;

  constructor(kind: DepgraphErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.kind = kind;
  }
}

/**
 * ルートディレクトリが存在しない / 読めない
 */
export class DiscoveryError extends DepgraphError {
  constructor(
    readonly root: string,
    reason: string,
    options?: { cause?: unknown }
  ) {
    super('discovery', `Cannot scan ${root}: ${reason}`, options);
  }
}

/**
 * ファイルを開けない、または最後まで読めない
 */
export class ReadError extends DepgraphError {
  constructor(
    readonly filePath: string,
    reason: string,
    options?: { cause?: unknown }
  ) {
    super('read', `Cannot read ${filePath}: ${reason}`, options);
  }
}

/**
 * import マーカーの後に閉じ引用符がない、または import 先が UTF-8 として不正
 */
export class MalformedImportError extends DepgraphError {
  constructor(
    readonly offset: number,
    problem = 'Unterminated import'
  ) {
    super('malformed-import', `${problem} at byte ${offset}`);
  }
}

export class NormalizationError extends DepgraphError {
  constructor(readonly rawPath: string) {
    super('normalization', `Cannot derive a module name from ${JSON.stringify(rawPath)}`);
  }
}
