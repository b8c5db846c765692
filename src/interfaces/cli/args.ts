/**
 * Command-line Argument Parser
 * Layer: Interfaces (CLI)
 *
 * Accepts `--flag value`, `--flag=value` and the short forms -i/-o/-h. Tokens
 * are collected into a raw bag first, then checked against a Zod schema, the
 * same way request bodies were validated at the HTTP edge: a failed check
 * becomes one ValidationError whose message lists every issue.
 */
import { ValidationError } from '@shared/errors/AppError';
import type { RunRequest } from '@shared/types';
import { z } from 'zod/v4';

export const USAGE = `Usage: route-compare --input <file> --directions-key <key> --routes-key <key> [--output <file.csv>]

Options:
  -i, --input <file>        CSV or XLSX file with geohash pair columns
                            (CX_GH/RX_GH, customer_geohash/restaurant_geohash or cx_geohash/rx_geohash)
  -o, --output <file.csv>   CSV output path; the workbook is written beside it as .xlsx
                            (default: comparison_<timestamp>.csv in OUTPUT_DIR)
      --directions-key <k>  API key for the Directions API
      --routes-key <k>      API key for the Routes API
      --create-sample       Write a small sample input file to --input and exit
  -h, --help                Show this help`;

export type CliCommand =
  | { kind: 'help' }
  | { kind: 'create-sample'; inputPath: string }
  | { kind: 'compare'; request: RunRequest };

interface RawArgs {
  input?: string;
  output?: string;
  directionsKey?: string;
  routesKey?: string;
  createSample: boolean;
  help: boolean;
}

type ValueOption = 'input' | 'output' | 'directionsKey' | 'routesKey';

const VALUE_FLAGS: Record<string, ValueOption> = {
  '--input': 'input',
  '-i': 'input',
  '--output': 'output',
  '-o': 'output',
  '--directions-key': 'directionsKey',
  '--routes-key': 'routesKey',
};

const SWITCH_FLAGS: Record<string, 'createSample' | 'help'> = {
  '--create-sample': 'createSample',
  '--help': 'help',
  '-h': 'help',
};

const requiredOption = (flag: string) =>
  z.string({ error: `Missing required option ${flag}` }).min(1, `${flag} must not be empty`);

const compareArgsSchema = z.object({
  input: requiredOption('--input/-i'),
  directionsKey: requiredOption('--directions-key'),
  routesKey: requiredOption('--routes-key'),
  output: z.string().min(1, '--output/-o must not be empty').optional(),
});

const sampleArgsSchema = z.object({
  input: requiredOption('--input/-i'),
});

function looksLikeFlag(token: string | undefined): boolean {
  return token !== undefined && token.length > 1 && token.startsWith('-');
}

export function tokenize(argv: readonly string[]): RawArgs {
  const raw: RawArgs = { createSample: false, help: false };

  for (let i = 0; i < argv.length; i++) {
    const token = argv[i];
    const eq = token.startsWith('--') ? token.indexOf('=') : -1;
    const flag = eq === -1 ? token : token.slice(0, eq);
    const inlineValue = eq === -1 ? undefined : token.slice(eq + 1);

    const valueOption = VALUE_FLAGS[flag];
    if (valueOption !== undefined) {
      let value = inlineValue;
      if (value === undefined) {
        const next = argv[i + 1];
        if (next === undefined || looksLikeFlag(next)) {
          throw new ValidationError(`Option ${flag} requires a value`);
        }
        value = next;
        i++;
      }
      raw[valueOption] = value;
      continue;
    }

    const switchOption = SWITCH_FLAGS[flag];
    if (switchOption !== undefined) {
      if (inlineValue !== undefined) {
        throw new ValidationError(`Option ${flag} does not take a value`);
      }
      raw[switchOption] = true;
      continue;
    }

    throw new ValidationError(
      looksLikeFlag(token) ? `Unknown option ${flag}` : `Unexpected argument "${token}"`,
    );
  }

  return raw;
}

function validate<T extends z.ZodType>(schema: T, raw: RawArgs): z.infer<T> {
  const result = schema.safeParse(raw);
  if (!result.success) {
    const messages = result.error.issues.map((issue) => issue.message).join('; ');
    throw new ValidationError(messages);
  }
  return result.data;
}

export function parseCliArgs(argv: readonly string[]): CliCommand {
  const raw = tokenize(argv);

  if (raw.help) return { kind: 'help' };

  if (raw.createSample) {
    const { input } = validate(sampleArgsSchema, raw);
    return { kind: 'create-sample', inputPath: input };
  }

  const args = validate(compareArgsSchema, raw);
  return {
    kind: 'compare',
    request: {
      inputPath: args.input,
      outputPath: args.output,
      directionsKey: args.directionsKey,
      routesKey: args.routesKey,
    },
  };
}
