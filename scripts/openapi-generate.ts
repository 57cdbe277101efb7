import { mkdir, writeFile } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';
import { stringify } from 'yaml';
import { createApiApp } from '../apps/api/src/bootstrap';
import { buildOpenApiDocument } from '../apps/api/src/openapi';

const DEFAULT_OUT = 'docs/openapi/openapi.yaml';

function readOutPath(argv: ReadonlyArray<string>): string {
  const index = argv.indexOf('--out');
  if (index === -1) return DEFAULT_OUT;
  const value = argv[index + 1];
  if (!value || value.startsWith('--')) throw new Error('--out needs a path');
  return value;
}

async function main() {
  const outPath = resolve(process.cwd(), readOutPath(process.argv.slice(2)));
  // The contract does not depend on stores; keep generation free of a Redis connection.
  delete process.env.REDIS_URL;

  const app = await createApiApp();
  try {
    const document = buildOpenApiDocument(app);
    await mkdir(dirname(outPath), { recursive: true });
    await writeFile(outPath, stringify(document, { indent: 2 }), 'utf8');
    process.stdout.write(`Wrote ${outPath}\n`);
  } finally {
    await app.close();
  }
}

main().catch((err: unknown) => {
  const msg = err instanceof Error ? (err.stack ?? err.message) : String(err);
  process.stderr.write(`${msg}\n`);
  process.exit(1);
});
