export type ResetArgs = Readonly<{
  ip?: string;
  username?: string;
  help: boolean;
}>;

export const RESET_USAGE = [
  'Usage: npm run lockout:reset -- [--ip <address>] [--username <name>]',
  '',
  'Without options every attempt record is removed.',
  'With both options only records matching both are removed.',
].join('\n');

const VALUE_FLAGS = ['--ip', '--username'] as const;
type ValueFlag = (typeof VALUE_FLAGS)[number];

function isValueFlag(value: string): value is ValueFlag {
  return VALUE_FLAGS.some((flag) => flag === value);
}

/** Accepts `--ip 10.0.0.1` and `--ip=10.0.0.1`. */
export function parseResetArgs(argv: ReadonlyArray<string>): ResetArgs {
  const values: { ip?: string; username?: string } = {};
  let help = false;

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    if (arg === '--help' || arg === '-h') {
      help = true;
      continue;
    }

    const eq = arg.indexOf('=');
    const flag = eq === -1 ? arg : arg.slice(0, eq);
    if (!isValueFlag(flag)) {
      throw new Error(`Unknown argument: ${arg}`);
    }

    let value: string | undefined;
    if (eq === -1) {
      value = argv[i + 1];
      i += 1;
    } else {
      value = arg.slice(eq + 1);
    }
    if (value === undefined || value.trim() === '' || value.startsWith('--')) {
      throw new Error(`${flag} needs a value`);
    }

    if (flag === '--ip') values.ip = value.trim();
    else values.username = value.trim();
  }

  return { ...values, help };
}
