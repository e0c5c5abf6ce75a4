export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/** Timeouts and refused connections. Retried on the next cycle, never fatal. */
export class TransientIoError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "TransientIoError";
  }
}

/** A feed artifact that cannot be read; the affected tier is dropped for the cycle. */
export class MalformedFeedError extends Error {
  constructor(
    message: string,
    readonly source: string | null = null,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "MalformedFeedError";
  }
}

/** A device refused or failed a command. */
export class CapabilityFailureError extends Error {
  constructor(
    readonly deviceId: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "CapabilityFailureError";
  }
}

/** Rejected user or file configuration. The previous valid value stays in effect. */
export class ConfigurationError extends Error {
  constructor(
    message: string,
    readonly field: string | null = null,
  ) {
    super(message);
    this.name = "ConfigurationError";
  }
}

export class UnknownDeviceError extends Error {
  constructor(readonly deviceId: string) {
    super(`Unknown device '${deviceId}'`);
    this.name = "UnknownDeviceError";
  }
}
