import { promises as fs } from 'node:fs';
import path from 'node:path';
import { silentLogger, type Logger } from '@esforge/shared';
import { formatSource } from './format';
import { ApiEndpoint } from './model';
import { ApiModule, moduleFileName } from './module';
import { TemplateRenderer } from './renderer';
import { readApiSpecs } from './specReader';
import { unasyncFiles, type UnasyncOptions } from './unasync';

export type GenerateOptions = {
  specDirs: string[];
  outDir: string;
  /** Directory that receives the synchronous twin of every generated module. */
  sync?: string;
  templatesDir?: string;
  unasync?: UnasyncOptions;
  logger?: Logger;
};

export type GenerateResult = {
  namespaces: string[];
  files: string[];
  syncFiles: string[];
};

export function renderIndex(namespaces: readonly string[]): string {
  const lines = [...namespaces]
    .map((namespace) => moduleFileName(namespace).replace(/\.ts$/, ''))
    .sort()
    .map((name) => `export * from './${name}';`);
  return formatSource(lines.join('\n'), 'index.ts');
}

export async function generate(options: GenerateOptions): Promise<GenerateResult> {
  const logger = options.logger ?? silentLogger;
  const specs = await readApiSpecs(options.specDirs);
  const renderer = await TemplateRenderer.load(options.templatesDir);
  logger.debug({ endpoints: specs.length, specDirs: options.specDirs }, 'Read API specs');

  const modules = new Map<string, ApiModule>();
  for (const spec of specs) {
    let apiModule = modules.get(spec.namespace);
    if (!apiModule) {
      apiModule = await ApiModule.load(spec.namespace, options.outDir);
      modules.set(spec.namespace, apiModule);
    }
    apiModule.add(new ApiEndpoint(spec.namespace, spec.name, spec.definition));
  }

  await fs.mkdir(options.outDir, { recursive: true });
  const files: string[] = [];
  for (const apiModule of modules.values()) {
    files.push(await apiModule.dump(renderer));
    logger.info(
      { namespace: apiModule.namespace, endpoints: apiModule.endpoints.length, file: apiModule.filePath },
      'Generated API module'
    );
  }

  const namespaces = Array.from(modules.keys()).sort();
  const indexPath = path.join(options.outDir, 'index.ts');
  await fs.writeFile(indexPath, renderIndex(namespaces), 'utf8');
  files.push(indexPath);

  let syncFiles: string[] = [];
  if (options.sync) {
    syncFiles = await unasyncFiles(options.outDir, options.sync, options.unasync);
    logger.info({ files: syncFiles.length, outDir: options.sync }, 'Wrote synchronous modules');
  }

  return { namespaces, files, syncFiles };
}
