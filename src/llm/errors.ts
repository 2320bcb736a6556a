/**
 * Raised when a payload returned by the inference endpoint does not match any
 * shape the client understands.
 */
export class ResponseDecodeError extends Error {
  /** What was being decoded, e.g. "response" */
  readonly subject: string;
  /** Validation issues reported by the decoder */
  readonly issues: string[];

  constructor(subject: string, issues: string[]) {
    super(`Malformed ${subject} from endpoint: ${issues.join("; ")}`);
    this.name = "ResponseDecodeError";
    this.subject = subject;
    this.issues = issues;
  }
}
