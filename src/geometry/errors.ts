import type { ZodError } from "zod";

/**
 * Raised when a caller passes tessellation parameters that cannot be honoured
 * together, or that are invalid on their own.
 */
export class TessellationConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "TessellationConfigError";
  }
}

/**
 * Raised when a draw command's vertex and color buffers disagree in arity.
 * The command is never truncated or padded to fit.
 */
export class MalformedDrawCallError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "MalformedDrawCallError";
  }
}

export const describeIssues = (label: string, error: ZodError): string =>
  `${label}: ${error.issues
    .map((issue) =>
      issue.path.length > 0 ? `${issue.path.join(".")} ${issue.message}` : issue.message
    )
    .join("; ")}`;
