import ts from 'typescript';
import { GenerationError } from './errors';

function describeDiagnostic(diagnostic: ts.Diagnostic): string {
  const message = ts.flattenDiagnosticMessageText(diagnostic.messageText, '\n');
  if (diagnostic.file && diagnostic.start !== undefined) {
    const { line, character } = diagnostic.file.getLineAndCharacterOfPosition(diagnostic.start);
    return `${line + 1}:${character + 1} ${message}`;
  }
  return message;
}

/** Throws `GenerationError` when the source has syntax errors. */
export function checkSyntax(source: string, fileName: string): void {
  const { diagnostics = [] } = ts.transpileModule(source, {
    fileName,
    reportDiagnostics: true,
    compilerOptions: {
      target: ts.ScriptTarget.ES2022,
      module: ts.ModuleKind.CommonJS
    }
  });
  const errors = diagnostics.filter((diagnostic) => diagnostic.category === ts.DiagnosticCategory.Error);
  if (errors.length > 0) {
    throw new GenerationError(fileName, errors.map(describeDiagnostic));
  }
}

/**
 * Syntax-checks generated source, then strips trailing whitespace, collapses runs of
 * blank lines and ends the file with exactly one newline.
 */
export function formatSource(source: string, fileName: string): string {
  checkSyntax(source, fileName);
  const lines = source.split('\n').map((line) => line.trimEnd());
  return `${lines.join('\n').replace(/\n{3,}/g, '\n\n').replace(/^\n+/, '').trimEnd()}\n`;
}
