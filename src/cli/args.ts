import { ConfigOverrides } from '../config';

export type CliArgs = ConfigOverrides & {
  input?: string;
  help: boolean;
  errors: string[];
};

export const USAGE = [
  'Usage: vocab-anki-cards <input.csv> [options]',
  '',
  'Generate Anki cards from a vocabulary CSV (columns: Keyword, Vietnamese).',
  '',
  'Options:',
  '  -o, --output <file>        Output CSV file path (default: output.csv)',
  '  --sounds-dir <dir>         Directory for sound files (default: output/sounds)',
  '  --images-dir <dir>         Directory for image files (default: output/images)',
  '  --dictionary-url <url>     Dictionary API base URL',
  '  --missed-log <file>        Where to list words the dictionary did not know (default: skipped_words.txt)',
  '  -h, --help                 Show this help',
].join('\n');

const VALUE_FLAGS: Record<string, keyof ConfigOverrides> = {
  '-o': 'outputPath',
  '--output': 'outputPath',
  '--sounds-dir': 'soundsDir',
  '--images-dir': 'imagesDir',
  '--dictionary-url': 'dictionaryUrl',
  '--missed-log': 'missedLogPath',
};

// argv without the node binary and script path
export function parseArgs(argv: string[]): CliArgs {
  const out: CliArgs = { help: false, errors: [] };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    if (arg === '-h' || arg === '--help') {
      out.help = true;
      continue;
    }

    const eq = arg.startsWith('--') ? arg.indexOf('=') : -1;
    const flag = eq > 0 ? arg.slice(0, eq) : arg;
    const key = VALUE_FLAGS[flag];
    if (key) {
      const value = eq > 0 ? arg.slice(eq + 1) : argv[i + 1];
      if (value === undefined || value === '' || (eq < 0 && value.startsWith('-'))) {
        out.errors.push(`Missing value for ${flag}`);
        continue;
      }
      out[key] = value;
      if (eq < 0) i++;
      continue;
    }

    if (arg.startsWith('-') && arg !== '-') {
      out.errors.push(`Unknown option: ${arg}`);
      continue;
    }

    if (out.input === undefined) {
      out.input = arg;
    } else {
      out.errors.push(`Unexpected argument: ${arg}`);
    }
  }

  if (!out.help && out.input === undefined) out.errors.push('Missing input CSV file path');
  return out;
}
