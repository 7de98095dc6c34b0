import { promises as fs } from 'node:fs';
import path from 'node:path';
import ts from 'typescript';

export const DEFAULT_REPLACEMENTS: Readonly<Record<string, string>> = {
  NamespacedClient: 'SyncNamespacedClient',
  TransportLike: 'SyncTransportLike'
};

export type UnasyncOptions = {
  /** Identifier renames applied on top of the defaults. */
  replacements?: Record<string, string>;
};

type Token = {
  kind: ts.SyntaxKind;
  text: string;
};

const TRIVIA = new Set([
  ts.SyntaxKind.WhitespaceTrivia,
  ts.SyntaxKind.NewLineTrivia,
  ts.SyntaxKind.SingleLineCommentTrivia,
  ts.SyntaxKind.MultiLineCommentTrivia,
  ts.SyntaxKind.ShebangTrivia,
  ts.SyntaxKind.ConflictMarkerTrivia
]);

// a `/` after one of these is division, anywhere else it starts a regular expression
const EXPRESSION_ENDS = new Set([
  ts.SyntaxKind.Identifier,
  ts.SyntaxKind.NumericLiteral,
  ts.SyntaxKind.BigIntLiteral,
  ts.SyntaxKind.StringLiteral,
  ts.SyntaxKind.RegularExpressionLiteral,
  ts.SyntaxKind.NoSubstitutionTemplateLiteral,
  ts.SyntaxKind.TemplateTail,
  ts.SyntaxKind.CloseParenToken,
  ts.SyntaxKind.CloseBracketToken,
  ts.SyntaxKind.CloseBraceToken,
  ts.SyntaxKind.PlusPlusToken,
  ts.SyntaxKind.MinusMinusToken,
  ts.SyntaxKind.ThisKeyword,
  ts.SyntaxKind.SuperKeyword,
  ts.SyntaxKind.TrueKeyword,
  ts.SyntaxKind.FalseKeyword,
  ts.SyntaxKind.NullKeyword
]);

// `async` followed by one of these is an identifier, not a modifier
const NOT_MODIFIER_FOLLOWERS = new Set([
  ts.SyntaxKind.EqualsToken,
  ts.SyntaxKind.ColonToken,
  ts.SyntaxKind.CommaToken,
  ts.SyntaxKind.CloseParenToken,
  ts.SyntaxKind.SemicolonToken,
  ts.SyntaxKind.DotToken,
  ts.SyntaxKind.QuestionToken,
  ts.SyntaxKind.CloseBraceToken
]);

function scanTokens(source: string): Token[] {
  const scanner = ts.createScanner(ts.ScriptTarget.Latest, false, ts.LanguageVariant.Standard, source);
  const tokens: Token[] = [];
  const templateDepths: number[] = [];
  let depth = 0;
  let previous: ts.SyntaxKind | undefined;

  for (let kind = scanner.scan(); kind !== ts.SyntaxKind.EndOfFileToken; kind = scanner.scan()) {
    if (kind === ts.SyntaxKind.OpenBraceToken) {
      depth += 1;
    } else if (kind === ts.SyntaxKind.CloseBraceToken) {
      if (templateDepths.length > 0 && templateDepths[templateDepths.length - 1] === depth) {
        kind = scanner.reScanTemplateToken(false);
        if (kind === ts.SyntaxKind.TemplateTail) {
          templateDepths.pop();
        }
      } else {
        depth -= 1;
      }
    } else if (kind === ts.SyntaxKind.TemplateHead) {
      templateDepths.push(depth);
    } else if (
      (kind === ts.SyntaxKind.SlashToken || kind === ts.SyntaxKind.SlashEqualsToken) &&
      (previous === undefined || !EXPRESSION_ENDS.has(previous))
    ) {
      kind = scanner.reScanSlashToken();
    }

    tokens.push({ kind, text: scanner.getTokenText() });
    if (!TRIVIA.has(kind)) {
      previous = kind;
    }
  }
  return tokens;
}

function nextSignificant(tokens: Token[], from: number): number {
  for (let index = from + 1; index < tokens.length; index += 1) {
    if (!TRIVIA.has(tokens[index].kind)) {
      return index;
    }
  }
  return -1;
}

function previousSignificant(tokens: Token[], from: number): number {
  for (let index = from - 1; index >= 0; index -= 1) {
    if (!TRIVIA.has(tokens[index].kind)) {
      return index;
    }
  }
  return -1;
}

function kindAt(tokens: Token[], index: number): ts.SyntaxKind | undefined {
  return index === -1 ? undefined : tokens[index].kind;
}

function isAsyncModifier(tokens: Token[], index: number): boolean {
  const next = nextSignificant(tokens, index);
  const nextKind = kindAt(tokens, next);
  if (nextKind === undefined || NOT_MODIFIER_FOLLOWERS.has(nextKind)) {
    return false;
  }
  // `async(` is a call, `async (` starts an arrow function
  return nextKind !== ts.SyntaxKind.OpenParenToken || next > index + 1;
}

function matchingAngle(tokens: Token[], open: number): number {
  let depth = 0;
  for (let index = open; index < tokens.length; index += 1) {
    const kind = tokens[index].kind;
    if (kind === ts.SyntaxKind.LessThanToken) {
      depth += 1;
    } else if (kind === ts.SyntaxKind.GreaterThanToken) {
      depth -= 1;
      if (depth === 0) {
        return index;
      }
    } else if (kind === ts.SyntaxKind.SemicolonToken) {
      return -1;
    }
  }
  return -1;
}

/**
 * Rewrites asynchronous source into its synchronous twin at the token level: `async`
 * modifiers and `await` keywords go away with the whitespace after them, `Promise<T>`
 * becomes `T` and identifiers are renamed. Comments and strings are left alone.
 */
export function unasync(source: string, options: UnasyncOptions = {}): string {
  const replacements = new Map(Object.entries({ ...DEFAULT_REPLACEMENTS, ...options.replacements }));
  const tokens = scanTokens(source);
  const dropped = new Set<number>();

  const dropWithWhitespace = (index: number) => {
    dropped.add(index);
    if (index + 1 < tokens.length && tokens[index + 1].kind === ts.SyntaxKind.WhitespaceTrivia) {
      dropped.add(index + 1);
    }
  };

  for (let index = 0; index < tokens.length; index += 1) {
    const token = tokens[index];
    const previousKind = kindAt(tokens, previousSignificant(tokens, index));
    if (previousKind === ts.SyntaxKind.DotToken) {
      continue;
    }

    if (token.kind === ts.SyntaxKind.AsyncKeyword && isAsyncModifier(tokens, index)) {
      dropWithWhitespace(index);
    } else if (token.kind === ts.SyntaxKind.AwaitKeyword) {
      dropWithWhitespace(index);
    } else if (
      token.kind === ts.SyntaxKind.Identifier &&
      token.text === 'Promise' &&
      index + 1 < tokens.length &&
      tokens[index + 1].kind === ts.SyntaxKind.LessThanToken &&
      previousKind !== ts.SyntaxKind.NewKeyword
    ) {
      const close = matchingAngle(tokens, index + 1);
      if (close !== -1) {
        dropped.add(index);
        dropped.add(index + 1);
        dropped.add(close);
      }
    }
  }

  return tokens
    .map((token, index) => {
      if (dropped.has(index)) {
        return '';
      }
      if (token.kind === ts.SyntaxKind.Identifier) {
        return replacements.get(token.text) ?? token.text;
      }
      return token.text;
    })
    .join('');
}

async function listSourceFiles(root: string, relative = ''): Promise<string[]> {
  const entries = await fs.readdir(path.join(root, relative), { withFileTypes: true });
  const files: string[] = [];
  for (const entry of entries.sort((left, right) => left.name.localeCompare(right.name))) {
    const entryPath = path.join(relative, entry.name);
    if (entry.isDirectory()) {
      files.push(...(await listSourceFiles(root, entryPath)));
    } else if (entry.isFile() && entry.name.endsWith('.ts')) {
      files.push(entryPath);
    }
  }
  return files;
}

/** Writes the synchronous twin of every `.ts` file under `fromDir` to the same path under `toDir`. */
export async function unasyncFiles(fromDir: string, toDir: string, rules: UnasyncOptions = {}): Promise<string[]> {
  const written: string[] = [];
  for (const file of await listSourceFiles(fromDir)) {
    const source = await fs.readFile(path.join(fromDir, file), 'utf8');
    const target = path.join(toDir, file);
    await fs.mkdir(path.dirname(target), { recursive: true });
    await fs.writeFile(target, unasync(source, rules), 'utf8');
    written.push(target);
  }
  return written;
}
