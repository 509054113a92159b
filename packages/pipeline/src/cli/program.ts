/**
 * CLI definition
 *
 *   crypto-backfill <provider> run --start YYYY-MM-DD --end YYYY-MM-DD --tokens BTC,ETH --run-id ID
 *   crypto-backfill yahoo run --start ... --end ... --symbols ^GSPC,DX-Y.NYB --run-id ID
 *
 * The program only parses and validates; running is delegated to the
 * injected executor so the command surface can be tested without I/O.
 */

import { readFile } from 'node:fs/promises';
import { Command, CommanderError } from 'commander';
import { z } from 'zod';
import { isIsoDay, PROVIDERS, type DateWindow, type ProviderName } from '@crypto-backfill/config';
import { normalizeTokens, type RunSummary } from '../backfill/coordinator';
import { isConfigError, isSinkFailure } from '../lib/errors';

export const DEFAULT_ENV_FILE = 'config/api_keys.env';
export const DEFAULT_UNIVERSE_FILE = 'config/token_universe.json';
export const RUN_ID_PATTERN = /^[A-Za-z0-9._-]+$/;

export const EXIT_CODES = {
  ok: 0,
  failure: 1,
  config: 2,
  sink: 3,
} as const;

const PROVIDER_DESCRIPTIONS: Record<ProviderName, string> = {
  coinapi: 'Backfill daily OHLCV bars from CoinAPI',
  cryptopanic: 'Backfill news events from CryptoPanic',
  lunarcrush: 'Backfill social sentiment from LunarCrush',
  santiment: 'Backfill sentiment and on-chain metrics from Santiment',
  yahoo: 'Backfill macro index bars from Yahoo Finance',
};

// =============================================================================
// Option schemas
// =============================================================================

const isoDaySchema = z.string().refine(isIsoDay, { message: 'Expected a calendar day (YYYY-MM-DD)' });

/**
 * Options as commander hands them over
 */
const rawRunOptionsSchema = z.object({
  start: z.string(),
  end: z.string(),
  tokens: z.string().optional(),
  symbols: z.string().optional(),
  universe: z.string().optional(),
  runId: z.string(),
  envFile: z.string(),
});

export const runOptionsSchema = z
  .object({
    start: isoDaySchema,
    end: isoDaySchema,
    tokens: z.array(z.string()).min(1, 'At least one token is required'),
    runId: z.string().regex(RUN_ID_PATTERN, 'Run id may only contain letters, digits, ".", "_" and "-"'),
    envFile: z.string().min(1),
  })
  .refine((options) => options.start <= options.end, {
    message: 'start must not be after end',
    path: ['end'],
  });

export const universeSchema = z.union([
  z.array(z.string()),
  z.object({ tokens: z.array(z.string()) }),
]);

export interface RunRequest {
  provider: ProviderName;
  tokens: string[];
  window: DateWindow;
  runId: string;
  envFile: string;
}

export interface CliDeps {
  execute: (request: RunRequest) => Promise<RunSummary>;
  readUniverse?: (path: string) => Promise<string[]>;
  stdout?: (text: string) => void;
  stderr?: (text: string) => void;
}

/**
 * Token list from a universe file: either an array or { "tokens": [...] }
 */
export async function readUniverseFile(path: string): Promise<string[]> {
  const text = await readFile(path, 'utf8');
  const parsed = universeSchema.parse(JSON.parse(text));
  return Array.isArray(parsed) ? parsed : parsed.tokens;
}

export function splitList(value: string): string[] {
  return normalizeTokens(value.split(','));
}

// =============================================================================
// Program
// =============================================================================

export function buildProgram(deps: CliDeps): Command {
  const stdout = deps.stdout ?? ((text: string) => process.stdout.write(text));
  const stderr = deps.stderr ?? ((text: string) => process.stderr.write(text));
  const readUniverse = deps.readUniverse ?? readUniverseFile;

  const program = new Command();
  program
    .name('crypto-backfill')
    .description('Backfill historical crypto market, news, sentiment and macro data')
    .exitOverride()
    .configureOutput({ writeOut: stdout, writeErr: stderr });

  for (const provider of PROVIDERS) {
    const providerCmd = program.command(provider).description(PROVIDER_DESCRIPTIONS[provider]);
    const runCmd = providerCmd
      .command('run')
      .description(PROVIDER_DESCRIPTIONS[provider])
      .requiredOption('--start <date>', 'Start date YYYY-MM-DD (inclusive)')
      .requiredOption('--end <date>', 'End date YYYY-MM-DD (inclusive)')
      .requiredOption('--run-id <id>', 'Backfill run identifier')
      .option('--env-file <path>', 'Environment file with API keys', DEFAULT_ENV_FILE);

    if (provider === 'yahoo') {
      runCmd.requiredOption('--symbols <list>', 'Comma separated macro symbols e.g. ^GSPC,DX-Y.NYB');
    } else {
      runCmd
        .option('--tokens <list>', 'Comma separated symbols e.g. BTC,ETH')
        .option('--universe <path>', 'Token universe used when --tokens is omitted', DEFAULT_UNIVERSE_FILE);
    }

    runCmd.action(async () => {
      const raw = rawRunOptionsSchema.parse(runCmd.opts());

      let tokens: string[];
      if (raw.symbols !== undefined) {
        tokens = splitList(raw.symbols);
      } else if (raw.tokens !== undefined) {
        tokens = splitList(raw.tokens);
      } else {
        tokens = normalizeTokens(await readUniverse(raw.universe ?? DEFAULT_UNIVERSE_FILE));
      }

      const options = runOptionsSchema.parse({
        start: raw.start,
        end: raw.end,
        tokens,
        runId: raw.runId,
        envFile: raw.envFile,
      });

      await deps.execute({
        provider,
        tokens: options.tokens,
        window: { start: options.start, end: options.end },
        runId: options.runId,
        envFile: options.envFile,
      });
    });
  }

  return program;
}

// =============================================================================
// Exit codes
// =============================================================================

export function exitCodeFor(error: unknown): number {
  if (error instanceof CommanderError) {
    return error.exitCode === 0 ? EXIT_CODES.ok : EXIT_CODES.failure;
  }
  if (isConfigError(error)) return EXIT_CODES.config;
  if (isSinkFailure(error)) return EXIT_CODES.sink;
  return EXIT_CODES.failure;
}

function describeError(error: unknown): string {
  if (error instanceof z.ZodError) {
    const issues = error.errors
      .map((issue) => {
        const path = issue.path.join('.');
        return path ? `${path}: ${issue.message}` : issue.message;
      })
      .join(', ');
    return `Invalid arguments: ${issues}`;
  }
  return error instanceof Error ? error.message : String(error);
}

/**
 * Parse argv, run, and map the outcome to a process exit code
 */
export async function runCli(argv: readonly string[], deps: CliDeps): Promise<number> {
  const program = buildProgram(deps);
  try {
    await program.parseAsync([...argv]);
    return EXIT_CODES.ok;
  } catch (error) {
    const code = exitCodeFor(error);
    // commander has already printed its own usage errors
    if (!(error instanceof CommanderError)) {
      (deps.stderr ?? ((text: string) => process.stderr.write(text)))(`error: ${describeError(error)}\n`);
    }
    return code;
  }
}
