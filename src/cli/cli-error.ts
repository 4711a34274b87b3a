import { z, ZodError, type ZodTypeAny } from "zod";

export class CliError extends Error {
  readonly exitCode: number;

  constructor(message: string, exitCode = 1) {
    super(message);
    this.name = 'CliError';
    this.exitCode = exitCode;
  }
}

export function assert(condition: unknown, message: string, exitCode = 1): asserts condition {
  if (!condition) {
    throw new CliError(message, exitCode);
  }
}

/**
 * Validates parsed argv against a command schema; validation failures become
 * a CliError listing each offending option.
 */
export function parseArgs<S extends ZodTypeAny>(schema: S, argv: unknown): z.output<S> {
  try {
    return schema.parse(argv);
  } catch (err) {
    if (err instanceof ZodError) {
      const details = err.issues.map(issue => `--${issue.path.join('.')}: ${issue.message}`);
      throw new CliError(`Invalid arguments:\n  ${details.join('\n  ')}`);
    }
    throw err;
  }
}
