export type ErrorCode =
  | "NAVIGATION"
  | "AUTHENTICATION"
  | "ELEMENT_NOT_FOUND"
  | "ASSERTION_MISMATCH"
  | "REPORTING"
  | "CONFIG"
  | "SCENARIO_FORMAT"
  | "INVALID_OTP_SECRET";

export abstract class TrailcheckError extends Error {
  abstract readonly code: ErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Target URL unreachable or did not load within its bound. */
export class NavigationError extends TrailcheckError {
  readonly code = "NAVIGATION";

  constructor(
    readonly url: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

/** Credentials or challenge rejected, or the verified area never appeared. */
export class AuthenticationError extends TrailcheckError {
  readonly code = "AUTHENTICATION";
}

export class ElementNotFoundError extends TrailcheckError {
  readonly code = "ELEMENT_NOT_FOUND";

  constructor(readonly attempted: readonly string[], context?: string) {
    super(
      `No visible, enabled element for ${context ? `${context}: ` : ""}` +
        attempted.map((s) => `\`${s}\``).join(" -> ")
    );
  }
}

export class AssertionMismatchError extends TrailcheckError {
  readonly code = "ASSERTION_MISMATCH";

  constructor(
    readonly description: string,
    readonly expected: string,
    readonly observed: string
  ) {
    super(
      `${description}\n  expected: ${JSON.stringify(expected)}\n  observed: ${JSON.stringify(observed)}`
    );
  }
}

export type ReportingErrorKind =
  | "auth"
  | "not-found"
  | "validation"
  | "http"
  | "network"
  | "protocol";

/** A TestRail call failed. Caught at the reporting boundary, never rethrown. */
export class ReportingError extends TrailcheckError {
  readonly code = "REPORTING";

  constructor(
    readonly kind: ReportingErrorKind,
    message: string,
    readonly status?: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export class ConfigError extends TrailcheckError {
  readonly code = "CONFIG";
}

export class ScenarioFormatError extends TrailcheckError {
  readonly code = "SCENARIO_FORMAT";

  constructor(
    readonly filePath: string,
    message: string
  ) {
    super(`${filePath}: ${message}`);
  }
}

export class InvalidOtpSecretError extends TrailcheckError {
  readonly code = "INVALID_OTP_SECRET";
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
