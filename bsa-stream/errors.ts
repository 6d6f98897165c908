/**
 * Error taxonomy for BSA streams.
 *
 * Missed pulses and degenerate alignments are not errors: the first is an
 * event on the stream, the second an empty AlignedFrame.
 */

// Invalid beamline, channel or environment configuration; always thrown synchronously
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

// Subscription or history fetch failed while (re)initializing a stream
export class StreamInitError extends Error {
  constructor(
    message: string,
    readonly channel: string,
    readonly beamline: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'StreamInitError';
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
