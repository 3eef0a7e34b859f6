import { parseArgs } from 'util';
import { z } from 'zod';
import { ConfigError } from './errors.js';
import { DEFAULT_DNS_TIMEOUT_MS } from './DnsProber.js';
import { DEFAULT_HTTP_TIMEOUT_MS, DEFAULT_USER_AGENT } from './HttpProber.js';
import type { VerboseLevel } from './Logger.js';
import { DEFAULT_CONCURRENCY } from './TargetChecker.js';
import { FALLBACK_POLICIES } from './types.js';
import type { ExcludeFilter, FallbackPolicy } from './types.js';
import { DEFAULT_WHOIS_TIMEOUT_MS } from './WhoisProber.js';

export interface RunConfig {
  inputFile: string;
  outputFile: string;
  exclude: ExcludeFilter;
  concurrency: number;
  verboseLevel: VerboseLevel;
  fallback: FallbackPolicy;
  httpTimeoutMs: number;
  dnsTimeoutMs: number;
  whoisTimeoutMs: number;
  userAgent: string;
}

export const USAGE = `Usage: livecheck -i <input_file> -o <output_file> [options]

Options:
  -i, --input-file <path>      List of domains or URLs, one per line
  -o, --output-file <prefix>   Writes <prefix>_ACTIVE.txt and <prefix>_INACTIVE.txt
  -e, --exclude <status>       Do not write ACTIVE or INACTIVE results (default: none)
  -c, --concurrency <n>        Number of concurrent checks (default: ${DEFAULT_CONCURRENCY})
  -v, --verbose-level <n>      0 = errors only, 1 = results, 2 = detail (default: 1)
  -f, --fallback <policy>      ${FALLBACK_POLICIES.join(' | ')} (default: dns-and-whois)
  -h, --help                   Show this help

Environment:
  LIVECHECK_CONCURRENCY, LIVECHECK_HTTP_TIMEOUT_MS, LIVECHECK_DNS_TIMEOUT_MS,
  LIVECHECK_WHOIS_TIMEOUT_MS, LIVECHECK_USER_AGENT
`;

const positiveInt = z.coerce.number().int().positive();

const excludeSchema = z
  .string()
  .transform((value) => value.trim().toUpperCase())
  .pipe(z.enum(['', 'NONE', 'ACTIVE', 'INACTIVE']))
  .transform((value): ExcludeFilter => (value === '' ? 'NONE' : value));

const verboseSchema = z
  .union([z.boolean(), z.string()])
  .transform((value) => {
    if (value === true || value === 'true') return '1';
    if (value === false || value === 'false') return '0';
    return value;
  })
  .pipe(z.enum(['0', '1', '2']))
  .transform((value): VerboseLevel => (value === '0' ? 0 : value === '1' ? 1 : 2));

const RunConfigSchema = z.object({
  inputFile: z.string({ required_error: '--input-file is required' }).min(1),
  outputFile: z.string({ required_error: '--output-file is required' }).min(1),
  exclude: excludeSchema.default(''),
  concurrency: positiveInt.default(DEFAULT_CONCURRENCY),
  verboseLevel: verboseSchema.default('1'),
  fallback: z.enum(FALLBACK_POLICIES).default('dns-and-whois'),
  httpTimeoutMs: positiveInt.default(DEFAULT_HTTP_TIMEOUT_MS),
  dnsTimeoutMs: positiveInt.default(DEFAULT_DNS_TIMEOUT_MS),
  whoisTimeoutMs: positiveInt.default(DEFAULT_WHOIS_TIMEOUT_MS),
  userAgent: z.string().min(1).default(DEFAULT_USER_AGENT),
});

function parseFlags(argv: string[]) {
  return parseArgs({
    args: argv,
    options: {
      'input-file': { type: 'string', short: 'i' },
      'output-file': { type: 'string', short: 'o' },
      exclude: { type: 'string', short: 'e' },
      concurrency: { type: 'string', short: 'c' },
      'verbose-level': { type: 'string', short: 'v' },
      fallback: { type: 'string', short: 'f' },
      help: { type: 'boolean', short: 'h' },
    },
    strict: true,
    allowPositionals: false,
  });
}

export type ParsedArgs = { help: true } | { help: false; config: RunConfig };

/**
 * Builds the run configuration from command-line arguments and environment
 * variables. Flags take precedence over the environment.
 * @throws ConfigError on unknown flags or invalid values.
 */
export function parseConfig(
  argv: string[],
  env: NodeJS.ProcessEnv = process.env
): ParsedArgs {
  let values: ReturnType<typeof parseFlags>['values'];
  try {
    ({ values } = parseFlags(argv));
  } catch (error) {
    throw new ConfigError(error instanceof Error ? error.message : String(error));
  }

  if (values.help) {
    return { help: true };
  }

  const parsed = RunConfigSchema.safeParse({
    inputFile: values['input-file'],
    outputFile: values['output-file'],
    exclude: values.exclude,
    concurrency: values.concurrency ?? env.LIVECHECK_CONCURRENCY,
    verboseLevel: values['verbose-level'],
    fallback: values.fallback,
    httpTimeoutMs: env.LIVECHECK_HTTP_TIMEOUT_MS,
    dnsTimeoutMs: env.LIVECHECK_DNS_TIMEOUT_MS,
    whoisTimeoutMs: env.LIVECHECK_WHOIS_TIMEOUT_MS,
    userAgent: env.LIVECHECK_USER_AGENT,
  });

  if (!parsed.success) {
    const message = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || 'config'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration: ${message}`);
  }

  return { help: false, config: parsed.data };
}
