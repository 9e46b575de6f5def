export class CliError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliError";
  }
}

export interface CliArgs {
  help: boolean;
  matrixPath?: string;
  coefficient?: number;
}

export const USAGE = "Usage: payoff-criteria [matrix.json] [--coefficient <alpha>]";

function parseNumber(flag: string, raw: string | undefined): number {
  if (raw === undefined) {
    throw new CliError(`${flag} expects a value`);
  }
  const value = Number(raw);
  if (raw.trim() === "" || Number.isNaN(value)) {
    throw new CliError(`${flag} expects a number, got "${raw}"`);
  }
  return value;
}

export function parseArgs(argv: readonly string[]): CliArgs {
  const args: CliArgs = { help: false };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === "--help" || arg === "-h") {
      args.help = true;
    } else if (arg === "--coefficient" || arg === "-c") {
      args.coefficient = parseNumber(arg, argv[++i]);
    } else if (arg.startsWith("--coefficient=")) {
      args.coefficient = parseNumber("--coefficient", arg.slice("--coefficient=".length));
    } else if (arg.startsWith("-")) {
      throw new CliError(`unknown option ${arg}`);
    } else if (args.matrixPath === undefined) {
      args.matrixPath = arg;
    } else {
      throw new CliError(`unexpected argument ${arg}`);
    }
  }

  return args;
}
