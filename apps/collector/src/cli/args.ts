import { z } from 'zod';
import { IntervalSchema, SymbolSchema } from '@gapless/schemas';
import { ConfigurationError } from '@gapless/utils';

const csv = <T extends z.ZodTypeAny>(item: T) =>
  z
    .string()
    .transform((value) => value.split(',').map((part) => part.trim()).filter((part) => part.length > 0))
    .pipe(z.array(item).min(1));

const CliArgsSchema = z.object({
  config: z.string().min(1),
  store: z.enum(['postgres', 'memory']).default('postgres'),
  symbols: csv(SymbolSchema).optional(),
  intervals: csv(IntervalSchema).optional(),
  /** Minutes to run before stopping on its own */
  duration: z.coerce.number().positive().optional(),
});

export type CliArgs = z.infer<typeof CliArgsSchema>;

const FLAGS = ['config', 'store', 'symbols', 'intervals', 'duration'] as const;
type Flag = (typeof FLAGS)[number];

function isFlag(name: string): name is Flag {
  return FLAGS.some((flag) => flag === name);
}

export const USAGE =
  'Usage: gapless-collector --config <file> [--symbols A,B] [--intervals 1h,1d] [--duration <minutes>] [--store postgres|memory]';

/**
 * Parse `--flag value` and `--flag=value` arguments
 *
 * @throws ConfigurationError on unknown flags, missing values or invalid values
 */
export function parseCliArgs(argv: string[]): CliArgs {
  const raw: Partial<Record<Flag, string>> = {};

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (!arg.startsWith('--')) {
      throw new ConfigurationError(`Unexpected argument '${arg}'. ${USAGE}`);
    }
    const [name, inline] = arg.slice(2).split('=', 2);
    if (!isFlag(name)) {
      throw new ConfigurationError(`Unknown option '--${name}'. ${USAGE}`);
    }
    const value = inline ?? argv[++i];
    if (value === undefined || value.startsWith('--')) {
      throw new ConfigurationError(`Option '--${name}' needs a value`);
    }
    raw[name] = value;
  }

  const result = CliArgsSchema.safeParse(raw);
  if (!result.success) {
    const problems = result.error.issues.map((issue) => `--${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError(`Invalid arguments: ${problems.join('; ')}`);
  }
  return result.data;
}
