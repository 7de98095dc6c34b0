import { promises as fs } from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import { SpecError } from './errors';

const paramSchema = z.object({
  type: z.string().default('string'),
  description: z.string().default(''),
  options: z.array(z.string()).optional(),
  default: z.unknown().optional(),
  required: z.boolean().optional(),
  deprecated: z.unknown().optional()
});

const pathSchema = z.object({
  path: z.string().startsWith('/'),
  methods: z.array(z.string()).min(1),
  parts: z.record(paramSchema).default({}),
  deprecated: z.unknown().optional()
});

const bodySchema = z.object({
  description: z.string().default(''),
  required: z.boolean().default(false),
  serialize: z.string().optional()
});

const documentationSchema = z.union([
  z.string(),
  z.object({
    url: z.string().default(''),
    description: z.string().default('')
  })
]);

export const endpointDefinitionSchema = z.object({
  documentation: documentationSchema,
  stability: z.string().default('stable'),
  url: z.object({
    paths: z.array(pathSchema).min(1)
  }),
  params: z.record(paramSchema).default({}),
  body: bodySchema.nullable().optional()
});

const specDocumentSchema = z.record(z.unknown());

export type ParamDefinition = z.infer<typeof paramSchema>;
export type EndpointPath = z.infer<typeof pathSchema>;
export type BodyDefinition = z.infer<typeof bodySchema>;
export type EndpointDefinition = z.infer<typeof endpointDefinitionSchema>;

export type ApiSpec = {
  namespace: string;
  name: string;
  file: string;
  definition: EndpointDefinition;
};

export const ROOT_NAMESPACE = 'core';

/** Splits `indices.put_mapping` into its namespace and endpoint name. */
export function splitApiName(fullName: string): { namespace: string; name: string } {
  const index = fullName.lastIndexOf('.');
  if (index === -1) {
    return { namespace: ROOT_NAMESPACE, name: fullName };
  }
  return { namespace: fullName.slice(0, index), name: fullName.slice(index + 1) };
}

async function readSpecFile(file: string, fullName: string): Promise<EndpointDefinition> {
  const raw = await fs.readFile(file, 'utf8');
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new SpecError(file, `invalid JSON (${reason})`, { cause: err });
  }

  const document = specDocumentSchema.safeParse(parsed);
  if (!document.success || !(fullName in document.data)) {
    throw new SpecError(file, `expected a definition keyed by '${fullName}'`);
  }
  const result = endpointDefinitionSchema.safeParse(document.data[fullName]);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '<root>'}: ${issue.message}`)
      .join('; ');
    throw new SpecError(file, details);
  }
  return result.data;
}

/**
 * Reads every endpoint definition under the given directories. Files are visited in
 * sorted order; a definition in a later directory replaces one with the same name.
 */
export async function readApiSpecs(dirs: readonly string[]): Promise<ApiSpec[]> {
  const specs = new Map<string, ApiSpec>();
  for (const dir of dirs) {
    const entries = (await fs.readdir(dir)).sort();
    for (const entry of entries) {
      if (!entry.endsWith('.json') || entry === '_common.json') {
        continue;
      }
      const file = path.join(dir, entry);
      const fullName = entry.slice(0, -'.json'.length);
      const definition = await readSpecFile(file, fullName);
      specs.set(fullName, { ...splitApiName(fullName), file, definition });
    }
  }
  return Array.from(specs.values());
}
