import assert from 'node:assert/strict';
import test from 'node:test';
import { GenerationError } from '../src/errors';
import { checkSyntax, formatSource } from '../src/format';

test('formatSource normalizes whitespace', () => {
  assert.equal(
    formatSource('\n\nconst a = 1;   \n\n\n\nconst b = 2;\n\n', 'sample.ts'),
    'const a = 1;\n\nconst b = 2;\n'
  );
});

test('syntax errors raise GenerationError with positions', () => {
  assert.throws(
    () => formatSource('export const value = ;\n', 'broken.ts'),
    (err: unknown) => {
      assert.ok(err instanceof GenerationError);
      assert.equal(err.file, 'broken.ts');
      assert.ok(err.diagnostics.length > 0);
      assert.match(err.diagnostics[0], /^1:22 /);
      assert.ok(err.message.startsWith('Generated source for broken.ts does not parse:\n  1:22 '));
      return true;
    }
  );
});

test('type errors are not syntax errors', () => {
  assert.doesNotThrow(() => checkSyntax("const count: number = 'many';\n", 'types.ts'));
});
