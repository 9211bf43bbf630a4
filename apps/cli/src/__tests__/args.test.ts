import { describe, expect, it } from 'vitest';
import { parseArgs } from '../lib/args.js';
import { CliError } from '../lib/errors.js';

describe('parseArgs', () => {
  it('fills in defaults', () => {
    expect(parseArgs(['monsters.yaml'])).toEqual({
      inputs: ['monsters.yaml'],
      output: 'cards.pdf',
      fonts: 'standard',
      fontDir: 'fonts',
      bleedMm: 0,
      exportMode: 'single',
      background: { kind: 'parchment' },
      allowSplit: true,
      json: false,
      help: false,
    });
  });

  it('reads short and long flags with values', () => {
    const options = parseArgs(['-o', 'out.pdf', '--fonts', 'free', '-b', '2.5', '-e', 'grid', 'a.yaml', 'b.yaml']);

    expect(options).toMatchObject({
      inputs: ['a.yaml', 'b.yaml'],
      output: 'out.pdf',
      fonts: 'free',
      bleedMm: 2.5,
      exportMode: 'grid',
    });
  });

  it('reads background and split switches', () => {
    expect(parseArgs(['--no-bg', '--no-split', 'a.yaml'])).toMatchObject({
      background: { kind: 'none' },
      allowSplit: false,
    });
    expect(parseArgs(['--bg', 'paper.png', 'a.yaml']).background).toEqual({ kind: 'image', path: 'paper.png' });
  });

  it('allows --help without inputs', () => {
    expect(parseArgs(['--help']).help).toBe(true);
  });

  it('rejects conflicting background flags', () => {
    expect(() => parseArgs(['--bg', 'paper.png', '--no-bg', 'a.yaml'])).toThrow(
      '--bg and --no-bg cannot be used together',
    );
  });

  it('rejects unknown values', () => {
    expect(() => parseArgs(['-f', 'fancy', 'a.yaml'])).toThrow(
      'Unknown font set "fancy" (expected standard, free or accurate)',
    );
    expect(() => parseArgs(['--export', 'poster', 'a.yaml'])).toThrow(
      'Unknown export mode "poster" (expected single or grid)',
    );
    expect(() => parseArgs(['--bleed', 'wide', 'a.yaml'])).toThrow(
      'Bleed must be a non-negative number of millimetres, got "wide"',
    );
    expect(() => parseArgs(['--verbose', 'a.yaml'])).toThrow('Unknown option: --verbose');
  });

  it('reports missing values and inputs as MISSING_REQUIRED', () => {
    expect(() => parseArgs(['a.yaml', '--out'])).toThrow(
      expect.objectContaining({ code: 'MISSING_REQUIRED', message: '--out requires a value' }),
    );
    expect(() => parseArgs([])).toThrow(CliError);
    expect(() => parseArgs([])).toThrow('At least one input file is required');
  });
});
