import { parseCrnInput } from './crns';
import { loadCrnFile } from './io';
import type { RegisterMode } from './types';

export interface RegisterArgs {
  crns: string[];
  file?: string;
  mode?: RegisterMode;
  yes: boolean;
  debug: boolean;
  help: boolean;
}

export const USAGE = `Usage: crn-register [options] [CRN...]

Opens Banner in Chromium, waits for you to log in (SSO/Duo) and open
Register for Classes -> Enter CRNs, then adds and submits the CRNs.

Options:
  --crn <list>         CRNs, comma or space separated (repeatable)
  --file <path>        read CRNs from a file, one or more per line, # comments
  --mode once|camp     try once, or retry until a seat opens
  -y, --yes            don't wait for Enter before and after the run
  --debug              verbose logging
  -h, --help           show this help

CRNs default to the CRNS environment variable, then an interactive prompt.`;

function isMode(value: string): value is RegisterMode {
  return value === 'once' || value === 'camp';
}

export function parseRegisterArgs(argv: readonly string[]): RegisterArgs {
  const args: RegisterArgs = { crns: [], yes: false, debug: false, help: false };

  const valueOf = (i: number, flag: string): string => {
    const value = argv[i + 1];
    if (value === undefined || value.startsWith('-')) {
      throw new Error(`${flag} needs a value`);
    }
    return value;
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case '--crn':
        args.crns.push(...parseCrnInput(valueOf(i, arg)));
        i++;
        break;
      case '--file':
        args.file = valueOf(i, arg);
        i++;
        break;
      case '--mode': {
        const mode = valueOf(i, arg).toLowerCase();
        if (!isMode(mode)) throw new Error(`--mode must be 'once' or 'camp', got '${mode}'`);
        args.mode = mode;
        i++;
        break;
      }
      case '-y':
      case '--yes':
        args.yes = true;
        break;
      case '--debug':
        args.debug = true;
        break;
      case '-h':
      case '--help':
        args.help = true;
        break;
      default:
        if (arg.startsWith('-')) throw new Error(`Unknown option: ${arg}`);
        args.crns.push(...parseCrnInput(arg));
    }
  }
  return args;
}

// Anything other than "once" camps.
export function modeFromAnswer(answer: string): RegisterMode {
  return answer.trim().toLowerCase() === 'once' ? 'once' : 'camp';
}

export type Ask = (question: string) => Promise<string>;

export const CRN_PROMPT = 'Enter CRN(s) (one or multiple, separated by spaces/commas): ';

// --crn / positional, then --file, then CRNS. null means ask once logged in.
export async function presetCrns(args: RegisterArgs, env: NodeJS.ProcessEnv): Promise<string[] | null> {
  if (args.crns.length > 0) return args.crns;
  if (args.file) return loadCrnFile(args.file);

  const fromEnv = parseCrnInput(env.CRNS ?? '');
  return fromEnv.length > 0 ? fromEnv : null;
}

export async function resolveMode(args: RegisterArgs, env: NodeJS.ProcessEnv, ask: Ask): Promise<RegisterMode> {
  if (args.mode) return args.mode;

  const fromEnv = env.REGISTER_MODE?.trim().toLowerCase();
  if (fromEnv && isMode(fromEnv)) return fromEnv;

  return modeFromAnswer(await ask("Type 'once' to try one time, or 'camp' to retry until it succeeds: "));
}
