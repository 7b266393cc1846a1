// Emitter: operator definitions -> JSON IR files

import { mkdirSync, readdirSync, writeFileSync } from 'node:fs';
import { basename, dirname, extname, join } from 'node:path';
import { fileURLToPath, pathToFileURL } from 'node:url';
import { compileOperator, describeCaptures } from './compiler.js';
import { FieldOperator } from './operator.js';
import type { CaptureDescriptor, OperatorIR } from './types.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

export interface EmittedOperator {
  ir: OperatorIR;
  captures: Record<string, CaptureDescriptor>;
}

export interface EmitOptions {
  log?: (message: string) => void;
}

function isDefinitionFile(file: string): boolean {
  return !file.endsWith('.d.ts') && (file.endsWith('.ts') || file.endsWith('.js'));
}

// Exported operators of a definition module, ordered by operator name
function collectOperators(mod: Record<string, unknown>): FieldOperator[] {
  return Object.values(mod)
    .filter((value): value is FieldOperator => value instanceof FieldOperator)
    .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
}

/**
 * Compile every operator exported by the modules in `definitionsDir` and
 * write `<outDir>/<module>/operators_ir.json`. Returns the written paths.
 */
export async function emitDefinitions(
  definitionsDir: string,
  outDir: string,
  { log = console.log }: EmitOptions = {}
): Promise<string[]> {
  log('🔧 Compiling operator definitions to JSON IR...');

  const files = readdirSync(definitionsDir).filter(isDefinitionFile).sort();
  const written: string[] = [];

  for (const file of files) {
    const name = basename(file, extname(file));
    log(`   Processing definition: ${name}`);

    const modulePath = join(definitionsDir, file);
    const mod: Record<string, unknown> = await import(modulePath);
    const operators: EmittedOperator[] = collectOperators(mod).map((operator) => ({
      ir: compileOperator(operator),
      captures: describeCaptures(operator),
    }));

    const outputDir = join(outDir, name);
    mkdirSync(outputDir, { recursive: true });

    const outputPath = join(outputDir, 'operators_ir.json');
    writeFileSync(outputPath, JSON.stringify({ operators }, null, 2), 'utf-8');
    written.push(outputPath);

    log(`   ✅ Generated: ${outputPath} (${operators.length} operator(s))`);
  }
  return written;
}

async function main() {
  await emitDefinitions(join(__dirname, 'definitions'), join(__dirname, '../_gen'));
}

if (process.argv[1] !== undefined && pathToFileURL(process.argv[1]).href === import.meta.url) {
  main().catch((err: unknown) => {
    console.error(err);
    process.exitCode = 1;
  });
}
