import type { Handle, RawFailure } from "./types"

/**
 * Codes for faults raised by the engine's collaborators: the generator,
 * the reference model's environment, or the system under test.
 */
export type CollaboratorFaultCode =
  | `INVALID_CONFIG`
  | `GENERATOR_FAILURE`
  | `MISSING_ENTITY`
  | `UNRESOLVABLE_HANDLE`
  | `UNSUPPORTED_OPERATION`

/**
 * Thrown when a failure payload has a shape the normalizer does not know.
 *
 * This is fatal for the whole run: it means the normalizer is out of date
 * with the system's error encoding, and coercing the payload to some code
 * would hide real divergences.
 */
export class NormalizationFaultError extends Error {
  /**
   * The payload that could not be normalized.
   */
  failure: RawFailure

  constructor(failure: RawFailure, reason: string) {
    super(`Unexpected failure (${reason}): ${describeFailure(failure)}`)
    this.name = `NormalizationFaultError`
    this.failure = failure
  }
}

/**
 * Thrown when the premises of a run are unmet: a missing auxiliary entity,
 * an unresolvable handle, an invalid generator config.
 */
export class CollaboratorFaultError extends Error {
  code: CollaboratorFaultCode

  /**
   * Underlying error, when the fault wraps one.
   */
  details?: unknown

  constructor(message: string, code: CollaboratorFaultCode, details?: unknown) {
    super(message)
    this.name = `CollaboratorFaultError`
    this.code = code
    this.details = details
  }

  static missingEntity(handle: Handle, side: string): CollaboratorFaultError {
    return new CollaboratorFaultError(
      `Tracked entity ${handle} does not exist in the ${side}`,
      `MISSING_ENTITY`
    )
  }

  static unresolvableHandle(
    handle: Handle,
    details?: unknown
  ): CollaboratorFaultError {
    return new CollaboratorFaultError(
      `Cannot resolve handle ${handle}`,
      `UNRESOLVABLE_HANDLE`,
      details
    )
  }
}

function describeFailure(failure: RawFailure): string {
  switch (failure.kind) {
    case `failwith`:
      return `failwith ${safeStringify(failure.value)}`
    case `expression`:
      return `expression ${safeStringify(failure.expression)}`
    case `transport`:
      return `transport ${
        failure.error instanceof Error
          ? `${failure.error.name}: ${failure.error.message}`
          : safeStringify(failure.error)
      }`
  }
}

function safeStringify(value: unknown): string {
  try {
    return (
      JSON.stringify(value, (_key, v: unknown) =>
        typeof v === `bigint` ? `${v}n` : v
      ) ?? String(value)
    )
  } catch {
    return String(value)
  }
}

/**
 * Thrown by the HTTP transport when the remote system answers with an
 * error status or cannot be reached.
 */
export class TransportError extends Error {
  status: number
  text?: string

  constructor(
    status: number,
    text: string | undefined,
    public url: string,
    message?: string
  ) {
    super(message || `HTTP Error ${status} at ${url}: ${text ?? ``}`)
    this.name = `TransportError`
    this.status = status
    this.text = text
  }

  static async fromResponse(
    response: Response,
    url: string
  ): Promise<TransportError> {
    const text = response.bodyUsed ? undefined : await response.text()
    return new TransportError(response.status, text, url)
  }
}
