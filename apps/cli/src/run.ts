import type { Logger } from "pino";
import { hurwicz, InvalidInputError, minimax, savage, type ProfitMatrix } from "@payoff/criteria-core";
import {
  coefficientSchema,
  DEFAULT_HURWICZ_COEFFICIENT,
  formatIssues,
  profitMatrixSchema,
} from "@payoff/shared";
import { CliError, parseArgs, USAGE } from "./args.js";
import { formatResults } from "./format.js";
import { REFERENCE_MATRIX } from "./reference.js";

export interface CliIo {
  write: (line: string) => void;
  readFile: (path: string) => Promise<string>;
  env: NodeJS.ProcessEnv;
  logger: Logger;
}

async function loadMatrix(path: string | undefined, io: CliIo): Promise<ProfitMatrix> {
  if (path === undefined) return REFERENCE_MATRIX;

  let text: string;
  try {
    text = await io.readFile(path);
  } catch (err) {
    throw new CliError(`cannot read ${path}: ${err instanceof Error ? err.message : String(err)}`);
  }

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (err) {
    throw new CliError(`${path} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
  }

  const parsed = profitMatrixSchema.safeParse(json);
  if (!parsed.success) {
    throw new CliError(`invalid matrix in ${path}: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}

/** --coefficient, then HURWICZ_COEFFICIENT, then the default. */
function resolveCoefficient(flag: number | undefined, env: NodeJS.ProcessEnv): number {
  let raw: number = DEFAULT_HURWICZ_COEFFICIENT;
  if (flag !== undefined) {
    raw = flag;
  } else if (env.HURWICZ_COEFFICIENT) {
    raw = Number(env.HURWICZ_COEFFICIENT);
  }

  const parsed = coefficientSchema.safeParse(raw);
  if (!parsed.success) {
    throw new CliError(`invalid coefficient ${raw}: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}

/** Evaluate the criteria and print them. Resolves to the process exit code. */
export async function run(argv: readonly string[], io: CliIo): Promise<number> {
  try {
    const args = parseArgs(argv);
    if (args.help) {
      io.write(USAGE);
      return 0;
    }

    const matrix = await loadMatrix(args.matrixPath, io);
    const coefficient = resolveCoefficient(args.coefficient, io.env);
    io.logger.debug({ rows: matrix.length, coefficient }, "evaluating criteria");

    const lines = formatResults({
      minimax: minimax(matrix),
      savage: savage(matrix),
      hurwicz: hurwicz(matrix, coefficient),
    });
    for (const line of lines) io.write(line);
    return 0;
  } catch (err) {
    if (err instanceof CliError) {
      io.logger.error(err.message);
      return 1;
    }
    if (err instanceof InvalidInputError) {
      io.logger.error({ code: err.code }, err.message);
      return 1;
    }
    throw err;
  }
}
