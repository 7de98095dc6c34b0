export class SpecError extends Error {
  readonly file: string;

  constructor(file: string, message: string, options?: { cause?: unknown }) {
    super(`${file}: ${message}`, options);
    this.name = 'SpecError';
    this.file = file;
  }
}

export class GenerationError extends Error {
  readonly file: string;
  readonly diagnostics: string[];

  constructor(file: string, diagnostics: string[]) {
    super(`Generated source for ${file} does not parse:\n${diagnostics.map((line) => `  ${line}`).join('\n')}`);
    this.name = 'GenerationError';
    this.file = file;
    this.diagnostics = diagnostics;
  }
}

export function isErrnoException(value: unknown): value is NodeJS.ErrnoException {
  return Boolean(value && typeof value === 'object' && 'code' in value);
}
