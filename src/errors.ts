export class InvalidDurationError extends Error {
  readonly duration: number;

  constructor(duration: number) {
    super(`Duration must be a whole number of seconds greater than zero (got ${duration}).`);
    this.name = "InvalidDurationError";
    this.duration = duration;
  }
}

export type UnavailableResource = "sound" | "notification";

/** A sound or notification could not be delivered. Always handled where it happens. */
export class ResourceUnavailableError extends Error {
  readonly resource: UnavailableResource;

  constructor(resource: UnavailableResource, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ResourceUnavailableError";
    this.resource = resource;
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
