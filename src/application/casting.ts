import type { Logger } from 'pino';
import type { ZodType, ZodTypeDef } from 'zod';
import type { Kwargs } from '../domain/index.js';

/** Zod schema describing the listener's parameters. Output replaces the raw kwargs. */
export type ParameterSchema = ZodType<Record<string, unknown>, ZodTypeDef, unknown>;

/**
 * Casts received kwargs to the listener's declared parameter types.
 *
 * Without a schema the kwargs pass through untouched. A kwargs object
 * that does not fit is passed through too, with a warning.
 */
export function castToSignature(
  kwargs: Kwargs,
  parameters: ParameterSchema | undefined,
  log: Logger,
): Readonly<Record<string, unknown>> {
  if (!parameters) return kwargs;

  const parsed = parameters.safeParse(kwargs);
  if (!parsed.success) {
    log.warn(
      { issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`) },
      'Could not cast event arguments to listener parameters, passing them through unchanged',
    );
    return kwargs;
  }
  return parsed.data;
}
