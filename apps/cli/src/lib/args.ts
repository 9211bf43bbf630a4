import { isFontSetName, type FontSetName } from '@statforge/style-engine';
import {
  DEFAULT_BLEED_MM,
  DEFAULT_EXPORT_MODE,
  DEFAULT_FONT_DIR,
  DEFAULT_FONT_SET,
  DEFAULT_OUTPUT,
  EXPORT_MODES,
  type ExportMode,
} from './constants.js';
import { CliError } from './errors.js';

/** `parchment` fills the card with the palette colour, `none` leaves it white, `image` draws a file. */
export type BackgroundChoice = { kind: 'parchment' } | { kind: 'none' } | { kind: 'image'; path: string };

export type CliOptions = {
  inputs: string[];
  output: string;
  fonts: FontSetName;
  fontDir: string;
  bleedMm: number;
  exportMode: ExportMode;
  background: BackgroundChoice;
  allowSplit: boolean;
  json: boolean;
  help: boolean;
};

const isExportMode = (value: string): value is ExportMode => EXPORT_MODES.some((mode) => mode === value);

export function parseArgs(args: readonly string[]): CliOptions {
  const options: CliOptions = {
    inputs: [],
    output: DEFAULT_OUTPUT,
    fonts: DEFAULT_FONT_SET,
    fontDir: DEFAULT_FONT_DIR,
    bleedMm: DEFAULT_BLEED_MM,
    exportMode: DEFAULT_EXPORT_MODE,
    background: { kind: 'parchment' },
    allowSplit: true,
    json: false,
    help: false,
  };
  let backgroundFlag: string | undefined;

  const valueOf = (flag: string, index: number): string => {
    const value = args[index + 1];
    if (value === undefined || value.startsWith('-')) {
      throw new CliError('MISSING_REQUIRED', `${flag} requires a value`);
    }
    return value;
  };

  const setBackground = (flag: string, choice: BackgroundChoice): void => {
    if (backgroundFlag && backgroundFlag !== flag) {
      throw new CliError('INVALID_ARGUMENT', `${backgroundFlag} and ${flag} cannot be used together`);
    }
    backgroundFlag = flag;
    options.background = choice;
  };

  for (let index = 0; index < args.length; index += 1) {
    const arg = args[index];
    switch (arg) {
      case '-h':
      case '--help':
        options.help = true;
        break;
      case '--json':
        options.json = true;
        break;
      case '--no-split':
        options.allowSplit = false;
        break;
      case '--no-bg':
        setBackground(arg, { kind: 'none' });
        break;
      case '--bg':
        setBackground(arg, { kind: 'image', path: valueOf(arg, index) });
        index += 1;
        break;
      case '-o':
      case '--out':
        options.output = valueOf(arg, index);
        index += 1;
        break;
      case '--font-dir':
        options.fontDir = valueOf(arg, index);
        index += 1;
        break;
      case '-f':
      case '--fonts': {
        const value = valueOf(arg, index);
        if (!isFontSetName(value)) {
          throw new CliError('INVALID_ARGUMENT', `Unknown font set "${value}" (expected standard, free or accurate)`);
        }
        options.fonts = value;
        index += 1;
        break;
      }
      case '-b':
      case '--bleed': {
        const value = valueOf(arg, index);
        const bleed = Number(value);
        if (value.trim() === '' || !Number.isFinite(bleed) || bleed < 0) {
          throw new CliError('INVALID_ARGUMENT', `Bleed must be a non-negative number of millimetres, got "${value}"`);
        }
        options.bleedMm = bleed;
        index += 1;
        break;
      }
      case '-e':
      case '--export': {
        const value = valueOf(arg, index);
        if (!isExportMode(value)) {
          throw new CliError('INVALID_ARGUMENT', `Unknown export mode "${value}" (expected single or grid)`);
        }
        options.exportMode = value;
        index += 1;
        break;
      }
      default:
        if (arg.startsWith('-')) {
          throw new CliError('INVALID_ARGUMENT', `Unknown option: ${arg}`);
        }
        options.inputs.push(arg);
    }
  }

  if (!options.help && options.inputs.length === 0) {
    throw new CliError('MISSING_REQUIRED', 'At least one input file is required');
  }
  return options;
}
