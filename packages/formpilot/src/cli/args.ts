import { z } from 'zod';
import type { Env } from '../config/env.js';

export const DEFAULT_COUNT = 125;
export const DEFAULT_WORKERS = 4;

export const USAGE = `Usage: formpilot [options]

Options:
  --url <formUrl>        Form to submit (default: $FORMPILOT_FORM_URL)
  --count <n>            Number of submissions (default: ${DEFAULT_COUNT})
  --workers <n>          Concurrent browser instances (default: ${DEFAULT_WORKERS})
  --seed <n>             Seed for reproducible answers
  --driver <type>        playwright | mock (default: playwright)
  --screenshots <dir>    Screenshot directory (default: $FORMPILOT_SCREENSHOT_DIR)
  --survey <file>        Survey definition JSON (default: bundled survey)
  --headed               Show the browser windows
  --honor-hints          Select the named option for directed questions
  -h, --help             Show this help`;

const CliArgsSchema = z.object({
  url: z.string().url(),
  count: z.coerce.number().int().min(0),
  workers: z.coerce.number().int().min(1),
  seed: z.coerce.number().int().min(0).max(0xffffffff).optional(),
  driver: z.enum(['playwright', 'mock']),
  screenshots: z.string().min(1),
  survey: z.string().min(1).optional(),
  headless: z.boolean(),
  honorHints: z.boolean(),
  help: z.boolean(),
});

export type CliArgs = z.infer<typeof CliArgsSchema>;

export class CliArgumentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliArgumentError';
  }
}

const VALUE_FLAGS = new Set(['url', 'count', 'workers', 'seed', 'driver', 'screenshots', 'survey']);
const BOOLEAN_FLAGS = new Set(['headed', 'honor-hints', 'help']);

/** Accepts `--flag value` and `--flag=value`. */
export function parseCliArgs(argv: readonly string[], env: Pick<Env, 'FORMPILOT_FORM_URL' | 'FORMPILOT_SCREENSHOT_DIR' | 'FORMPILOT_HEADLESS'>): CliArgs {
  const values: Record<string, string> = {};
  const flags = new Set<string>();

  for (let i = 0; i < argv.length; i++) {
    const token = argv[i];
    if (token === '-h') {
      flags.add('help');
      continue;
    }
    if (!token.startsWith('--')) {
      throw new CliArgumentError(`Unexpected argument: ${token}`);
    }

    const eq = token.indexOf('=');
    const name = eq === -1 ? token.slice(2) : token.slice(2, eq);

    if (BOOLEAN_FLAGS.has(name)) {
      if (eq !== -1) throw new CliArgumentError(`--${name} does not take a value`);
      flags.add(name);
      continue;
    }
    if (!VALUE_FLAGS.has(name)) {
      throw new CliArgumentError(`Unknown option: --${name}`);
    }

    if (eq !== -1) {
      values[name] = token.slice(eq + 1);
    } else {
      const next = argv[i + 1];
      if (next === undefined || next.startsWith('--')) {
        throw new CliArgumentError(`--${name} needs a value`);
      }
      values[name] = next;
      i++;
    }
  }

  const result = CliArgsSchema.safeParse({
    url: values.url ?? env.FORMPILOT_FORM_URL,
    count: values.count ?? DEFAULT_COUNT,
    workers: values.workers ?? DEFAULT_WORKERS,
    seed: values.seed,
    driver: values.driver ?? 'playwright',
    screenshots: values.screenshots ?? env.FORMPILOT_SCREENSHOT_DIR,
    survey: values.survey,
    headless: flags.has('headed') ? false : env.FORMPILOT_HEADLESS,
    honorHints: flags.has('honor-hints'),
    help: flags.has('help'),
  });

  if (!result.success) {
    const issue = result.error.issues[0];
    throw new CliArgumentError(`--${issue.path.join('.')}: ${issue.message}`);
  }
  return result.data;
}
