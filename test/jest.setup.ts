import { existsSync, readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { parse } from 'dotenv';

process.env.NODE_ENV ??= 'test';

// Only the Redis integration suite needs a value from `.env`; the rest run on in-process stores.
const envPath = resolve(process.cwd(), '.env');
const fromFile = existsSync(envPath) ? parse(readFileSync(envPath)) : {};
if (process.env.REDIS_URL === undefined && fromFile.REDIS_URL !== undefined) {
  process.env.REDIS_URL = fromFile.REDIS_URL;
}
