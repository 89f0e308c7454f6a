// ---------------------------------------------------------------------------
// Errors raised while building projection images. Per-pixel failures never
// throw; they resolve to black.
// ---------------------------------------------------------------------------

import type { z } from 'zod';

/** Base class for every error thrown by the projection engine. */
export class ProjectionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ProjectionError';
  }
}

/** A lens was asked for an incidence angle outside its analytic domain. */
export class LensDomainError extends ProjectionError {
  constructor(
    public readonly lens: string,
    public readonly angle: number,
    public readonly maxAngle: number,
  ) {
    super(
      `The ${lens} lens is undefined for an incidence angle of ` +
        `${formatDegrees(angle)} degrees (valid range 0 to ${formatDegrees(maxAngle)})`,
    );
    this.name = 'LensDomainError';
  }
}

/** A construction parameter failed validation. */
export class InvalidParameterError extends ProjectionError {
  constructor(
    public readonly parameter: string,
    message: string,
    public readonly issues: string[] = [],
  ) {
    super(`Invalid ${parameter}: ${message}`);
    this.name = 'InvalidParameterError';
  }
}

function formatDegrees(radians: number): string {
  return ((radians / Math.PI) * 180).toFixed(2);
}

/**
 * Parse `value` with a zod schema, turning a failure into an
 * {@link InvalidParameterError} that names `parameter`.
 */
export function parseParameter<Output>(
  schema: z.ZodType<Output, z.ZodTypeDef, unknown>,
  value: unknown,
  parameter: string,
): Output {
  const result = schema.safeParse(value);
  if (!result.success) {
    const issues = result.error.issues.map((issue) =>
      issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message,
    );
    throw new InvalidParameterError(parameter, issues.join('; '), issues);
  }
  return result.data;
}
