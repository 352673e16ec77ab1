export type FailureKind = "config" | "not-found" | "format" | "transport" | "internal";

export type FailureMessage = {
  kind: FailureKind;
  message: string;
};

export class JitAccessError extends Error {
  constructor(
    public readonly kind: Exclude<FailureKind, "internal">,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

export class ConfigError extends JitAccessError {
  constructor(message: string, public readonly key?: string) {
    super("config", key ? `[${key}] ${message}` : message);
  }
}

export type NotFoundResource = "identity" | "policy" | "bucket" | "principal-arn";

const notFoundLabels: Record<NotFoundResource, string> = {
  identity: "User not found",
  policy: "Permission set not found",
  bucket: "S3 bucket does not exist",
  "principal-arn": "User has no IAM principal ARN",
};

export class NotFoundError extends JitAccessError {
  constructor(
    public readonly resource: NotFoundResource,
    public readonly identifier: string,
  ) {
    super("not-found", `${notFoundLabels[resource]}: ${identifier}`);
  }
}

export class FormatError extends JitAccessError {
  constructor(
    message: string,
    public readonly input: string,
  ) {
    super("format", `${message}: ${JSON.stringify(input)}`);
  }
}

export class TransportError extends JitAccessError {
  constructor(
    public readonly operation: string,
    cause: unknown,
  ) {
    super("transport", `${operation} failed: ${cause instanceof Error ? cause.message : String(cause)}`, { cause });
  }
}

export function toTransportError(operation: string, error: unknown): JitAccessError {
  return error instanceof JitAccessError ? error : new TransportError(operation, error);
}

export function describeFailure(error: unknown, fallback: string): FailureMessage {
  if (error instanceof JitAccessError) {
    return { kind: error.kind, message: error.message };
  }
  return { kind: "internal", message: fallback };
}
