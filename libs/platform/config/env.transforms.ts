import { Transform, type TransformFnParams } from 'class-transformer';

export function parseEnvBoolean(value: unknown): boolean | undefined | string {
  if (value === undefined) return undefined;
  if (typeof value === 'boolean') return value;

  const normalized = String(value).trim().toLowerCase();
  if (normalized === '') return undefined;
  if (normalized === 'true' || normalized === '1') return true;
  if (normalized === 'false' || normalized === '0') return false;

  // Return the original value so `@IsBoolean()` fails (fail-fast) when an invalid value is provided.
  return String(value);
}

export function parseEnvInt(value: unknown, fallback: number): number | string {
  if (value === undefined) return fallback;
  if (typeof value === 'number') return value;

  const raw = String(value).trim();
  if (raw === '') return fallback;

  // Non-numeric input stays a string so `@IsInt()` reports the variable by name.
  return /^-?\d+$/.test(raw) ? Number(raw) : raw;
}

export function TransformEnvBoolean(): PropertyDecorator {
  return Transform(({ obj, key }: TransformFnParams) => {
    const source: Record<string, unknown> = obj;
    return parseEnvBoolean(source[key]);
  });
}

export function TransformEnvBooleanDefault(fallback: boolean): PropertyDecorator {
  return Transform(({ obj, key }: TransformFnParams) => {
    const source: Record<string, unknown> = obj;
    return parseEnvBoolean(source[key]) ?? fallback;
  });
}

export function TransformEnvInt(fallback: number): PropertyDecorator {
  return Transform(({ obj, key }: TransformFnParams) => {
    const source: Record<string, unknown> = obj;
    return parseEnvInt(source[key], fallback);
  });
}
