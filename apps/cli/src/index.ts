#!/usr/bin/env tsx

import { pathToFileURL } from 'node:url';
import { render, type RenderResult } from './commands/render.js';
import { parseArgs } from './lib/args.js';
import { toCliError } from './lib/errors.js';

const HELP = `
statforge: monster and item cards as print-ready PDF

Usage:
  statforge [options] <input.yaml...>

Options:
  -o, --out <file>        Output PDF (default: cards.pdf)
  -f, --fonts <set>       Font set: standard, free or accurate (default: standard)
      --font-dir <dir>    Directory holding the font files (default: fonts)
  -b, --bleed <mm>        Bleed added around every card (default: 0)
  -e, --export <mode>     single: one page per face; grid: A4 sheets of small cards
      --bg <image>        Draw an image behind the card text
      --no-bg             Plain white card background
      --no-split          Never split a paragraph between columns
      --json              Machine-readable output
  -h, --help              Show this message

Examples:
  statforge -o bestiary.pdf monsters/*.yaml
  statforge --export grid --bleed 2 items.yaml
`;

export type CliIO = {
  stdout(message: string): void;
  stderr(message: string): void;
};

const defaultIO: CliIO = {
  stdout: (message) => process.stdout.write(message),
  stderr: (message) => process.stderr.write(message),
};

function formatRenderResult(result: RenderResult): string {
  const lines = [`Wrote ${result.cards.length} cards to ${result.output}`];
  for (const card of result.cards) {
    lines.push(`  ${card.title}: ${card.size}`);
  }
  if (result.skipped.length > 0) {
    lines.push(`Skipped ${result.skipped.length}: ${result.skipped.join(', ')}`);
  }
  return lines.join('\n');
}

/** Runs one invocation and returns the process exit code. */
export async function run(args: readonly string[], io: CliIO = defaultIO): Promise<number> {
  const json = args.includes('--json');
  const startedAt = Date.now();

  try {
    const options = parseArgs(args);
    if (options.help) {
      io.stdout(HELP);
      return 0;
    }

    const result = await render(options);
    if (json) {
      io.stdout(
        `${JSON.stringify({ ok: true, command: 'render', data: result, meta: { elapsedMs: Date.now() - startedAt } })}\n`,
      );
    } else {
      io.stdout(`${formatRenderResult(result)}\n`);
    }
    return 0;
  } catch (error) {
    const cliError = toCliError(error);
    if (json) {
      io.stderr(`${JSON.stringify({ ok: false, error: { code: cliError.code, message: cliError.message } })}\n`);
    } else {
      io.stderr(`Error: ${cliError.message}\n`);
    }
    return cliError.exitCode;
  }
}

const invokedPath = process.argv[1];
if (invokedPath && import.meta.url === pathToFileURL(invokedPath).href) {
  run(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      console.error('[statforge] Unexpected failure:', error);
      process.exitCode = 1;
    },
  );
}
