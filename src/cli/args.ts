import { parseExtractionProvider, type ExtractionProviderType } from '../config/extraction.js';

export const COMMANDS = ['categories', 'category', 'search', 'check-config', 'help'] as const;

export type Command = (typeof COMMANDS)[number];

export interface CliArgs {
  command: Command;
  /** Positional words after the command, joined with spaces */
  argument: string;
  scopusKey?: string;
  extractionKey?: string;
  provider?: ExtractionProviderType;
  model?: string;
  json: boolean;
}

function isCommand(value: string): value is Command {
  return (COMMANDS as readonly string[]).includes(value);
}

/**
 * Parse argv (without the node and script entries)
 *
 * @throws Error on an unknown command or a flag missing its value
 */
export function parseCliArgs(argv: readonly string[]): CliArgs {
  const positional: string[] = [];
  const args: Omit<CliArgs, 'command' | 'argument'> = { json: false };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    const takeValue = (): string => {
      const value = argv[i + 1];
      if (value === undefined || value.startsWith('--')) {
        throw new Error(`Missing value for ${arg}`);
      }
      i++;
      return value;
    };

    switch (arg) {
      case '--scopus-key':
        args.scopusKey = takeValue();
        break;
      case '--extraction-key':
        args.extractionKey = takeValue();
        break;
      case '--provider':
        args.provider = parseExtractionProvider(takeValue());
        break;
      case '--model':
        args.model = takeValue();
        break;
      case '--json':
        args.json = true;
        break;
      default:
        if (arg.startsWith('--')) {
          throw new Error(`Unknown option: ${arg}`);
        }
        positional.push(arg);
    }
  }

  const [commandName = 'help', ...rest] = positional;
  if (!isCommand(commandName)) {
    throw new Error(`Unknown command: ${commandName}. Available: ${COMMANDS.join(', ')}`);
  }

  return { ...args, command: commandName, argument: rest.join(' ').trim() };
}
