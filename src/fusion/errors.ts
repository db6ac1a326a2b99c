/**
 * Failure Taxonomy
 *
 * Every failure the fusion core can produce is one of four kinds. Only
 * `TerminalFailure` ever reaches the orchestrator; the others are contained at
 * the smallest unit (one source, one sentence, one image).
 */

export type FailureKind = 'acquisition' | 'provider' | 'resource' | 'terminal';

/**
 * Formats an unknown thrown value for log lines and error messages.
 */
export function describeError(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

/**
 * Base class carrying the discriminator and the original cause.
 */
export abstract class FusionFailure extends Error {
  abstract readonly kind: FailureKind;

  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

/**
 * One source fetch failed. Recovered by skipping the source.
 */
export class AcquisitionFailure extends FusionFailure {
  readonly kind = 'acquisition';
  readonly name = 'AcquisitionFailure';

  constructor(
    readonly url: string,
    cause?: unknown
  ) {
    super(`Failed to acquire ${url}: ${describeError(cause)}`, cause);
  }
}

/**
 * An embedding or generation call failed. Recovered by treating the unit as
 * zero-score / non-match.
 */
export class ProviderFailure extends FusionFailure {
  readonly kind = 'provider';
  readonly name = 'ProviderFailure';

  constructor(
    readonly operation: string,
    cause?: unknown
  ) {
    super(`Provider call ${operation} failed: ${describeError(cause)}`, cause);
  }
}

/**
 * Memory utilization crossed the configured fraction. Recovered by a
 * reclamation pass; never surfaced past the summarizer.
 */
export class ResourceExhaustion extends FusionFailure {
  readonly kind = 'resource';
  readonly name = 'ResourceExhaustion';

  constructor(readonly utilization: number, readonly limit: number) {
    super(`Memory utilization ${(utilization * 100).toFixed(1)}% exceeds ${(limit * 100).toFixed(1)}%`);
  }
}

/**
 * Persistence is unreachable. Surfaced to the orchestrator; only the current
 * item aborts.
 */
export class TerminalFailure extends FusionFailure {
  readonly kind = 'terminal';
  readonly name = 'TerminalFailure';

  constructor(
    readonly operation: string,
    cause?: unknown
  ) {
    super(`${operation} failed: ${describeError(cause)}`, cause);
  }
}

export function isTerminalFailure(error: unknown): error is TerminalFailure {
  return error instanceof TerminalFailure;
}
