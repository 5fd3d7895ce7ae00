import fs from 'fs';
import { z } from 'zod';

export interface CliOptions {
  urls: string[];
  outputDir: string;
  settingsFile?: string;
}

const CliOptionsSchema = z.object({
  urls: z.array(z.string().min(1)),
  outputDir: z.string().min(1),
  settingsFile: z.string().min(1).optional(),
});

export const USAGE =
  'Usage: batch-media-downloader [--out <dir>] [--settings <file>] [--file <urls.txt>] <url> [url...]';

/**
 * Split a URL list file into URLs, one per line; blank lines and `#` comments are ignored
 */
export function parseUrlList(content: string): string[] {
  return content
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith('#'));
}

/**
 * Parse command line arguments (without the node and script entries)
 */
export function parseCliArgs(
  argv: string[],
  readFile: (filePath: string) => string = (filePath) => fs.readFileSync(filePath, 'utf-8'),
): CliOptions {
  const urls: string[] = [];
  let outputDir = './downloads';
  let settingsFile: string | undefined;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    const takeValue = (): string => {
      const value = argv[++i];
      if (value === undefined || value.startsWith('--')) {
        throw new Error(`Missing value for ${arg}`);
      }
      return value;
    };

    switch (arg) {
      case '--out':
        outputDir = takeValue();
        break;
      case '--settings':
        settingsFile = takeValue();
        break;
      case '--file':
        urls.push(...parseUrlList(readFile(takeValue())));
        break;
      default:
        if (arg.startsWith('--')) {
          throw new Error(`Unknown option: ${arg}`);
        }
        urls.push(arg);
    }
  }

  return CliOptionsSchema.parse({ urls, outputDir, settingsFile });
}
