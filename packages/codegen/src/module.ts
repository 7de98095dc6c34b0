import { promises as fs } from 'node:fs';
import path from 'node:path';
import ts from 'typescript';
import { isErrnoException } from './errors';
import { formatSource } from './format';
import { camelCase, type ApiEndpoint } from './model';
import type { TemplateRenderer } from './renderer';

export const SEPARATOR = '// AUTO-GENERATED-API-DEFINITIONS //';

export type ExistingModule = {
  header: string | null;
  order: string[];
  descriptions: Map<string, string>;
};

export function moduleFileName(namespace: string): string {
  return `${camelCase(namespace)}.ts`;
}

/**
 * Reads what a previous run left behind: the hand-editable header and the order and
 * descriptions of the generated methods.
 */
export function parseExistingModule(source: string, fileName: string): ExistingModule {
  const lines = source.split('\n');
  let headerEnd = lines.findIndex((line) => line.trim() === SEPARATOR);
  if (headerEnd === -1) {
    headerEnd = lines.findIndex((line) => /^export (?:abstract )?class\b/.test(line));
  }
  const header = headerEnd === -1 ? null : `${lines.slice(0, headerEnd + 1).join('\n')}\n`;

  const order: string[] = [];
  const descriptions = new Map<string, string>();
  const sourceFile = ts.createSourceFile(fileName, source, ts.ScriptTarget.Latest, true);
  for (const statement of sourceFile.statements) {
    if (!ts.isClassDeclaration(statement)) {
      continue;
    }
    for (const member of statement.members) {
      if (!ts.isMethodDeclaration(member) || !ts.isIdentifier(member.name)) {
        continue;
      }
      const name = member.name.text;
      order.push(name);
      for (const doc of ts.getJSDocCommentsAndTags(member)) {
        const text = ts.isJSDoc(doc) ? ts.getTextOfJSDocComment(doc.comment) : undefined;
        if (text) {
          descriptions.set(name, text.trim());
        }
      }
    }
  }

  return { header, order, descriptions };
}

export class ApiModule {
  readonly namespace: string;
  readonly filePath: string;
  private readonly existing: ExistingModule;
  private apis: ApiEndpoint[] = [];

  constructor(namespace: string, filePath: string, existing: ExistingModule) {
    this.namespace = namespace;
    this.filePath = filePath;
    this.existing = existing;
  }

  static async load(namespace: string, outDir: string): Promise<ApiModule> {
    const filePath = path.join(outDir, moduleFileName(namespace));
    let existing: ExistingModule = { header: null, order: [], descriptions: new Map() };
    try {
      existing = parseExistingModule(await fs.readFile(filePath, 'utf8'), filePath);
    } catch (err) {
      if (!isErrnoException(err) || err.code !== 'ENOENT') {
        throw err;
      }
    }
    return new ApiModule(namespace, filePath, existing);
  }

  get endpoints(): readonly ApiEndpoint[] {
    return this.apis;
  }

  add(api: ApiEndpoint): void {
    if (!api.description) {
      api.description = this.existing.descriptions.get(api.methodName) ?? '';
    }
    this.apis.push(api);
  }

  /** Methods keep the position they had in the existing file; new ones follow in the order added. */
  sort(): void {
    const order = this.existing.order;
    const position = (api: ApiEndpoint) => {
      const index = order.indexOf(api.methodName);
      return index === -1 ? order.length : index;
    };
    this.apis = [...this.apis].sort((left, right) => position(left) - position(right));
  }

  render(renderer: TemplateRenderer): string {
    this.sort();
    const rendered = this.apis.map((api) => renderer.renderEndpoint(api));
    const header = this.existing.header ?? renderer.renderHeader(this.namespace);
    const methods = rendered.map((entry) => entry.method).join('\n');
    const params = rendered.map((entry) => entry.params).join('\n');
    return formatSource(`${header}\n${methods}}\n\n${params}`, this.filePath);
  }

  async dump(renderer: TemplateRenderer): Promise<string> {
    const source = this.render(renderer);
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    await fs.writeFile(this.filePath, source, 'utf8');
    return this.filePath;
  }
}
