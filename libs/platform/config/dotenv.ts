import { existsSync } from 'node:fs';
import { resolve } from 'node:path';

let loadPromise: Promise<void> | undefined;

// Production-like processes take their environment from the platform; tests set theirs explicitly.
const SKIPPED_NODE_ENVS: ReadonlySet<string> = new Set(['production', 'staging', 'test']);

export function loadDotEnvOnce(cwd: string = process.cwd()): Promise<void> {
  if (loadPromise) return loadPromise;

  loadPromise = (async () => {
    const nodeEnv = typeof process.env.NODE_ENV === 'string' ? process.env.NODE_ENV.trim() : '';
    if (SKIPPED_NODE_ENVS.has(nodeEnv)) return;

    const envPath = resolve(cwd, '.env');
    if (!existsSync(envPath)) return;

    try {
      const dotenv = await import('dotenv');
      dotenv.config({ path: envPath, quiet: true });
    } catch (err: unknown) {
      const message = err instanceof Error ? err.message : String(err);
      process.stderr.write(`Ignoring unreadable .env file (${envPath}): ${message}\n`);
    }
  })();

  return loadPromise;
}
