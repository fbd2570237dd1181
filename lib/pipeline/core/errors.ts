import { isRetryableKind } from "./retry-policy";

export type ExtractionErrorKind =
  | "TooLarge"
  | "NoExtractableText"
  | "Corrupted"
  | "PasswordProtected";

export type GatewayErrorKind =
  | "InvalidCredential"
  | "QuotaExceeded"
  | "RateLimited"
  | "TransientNetwork"
  | "ModelUnavailable"
  | "MalformedResponse"
  | "InvalidRequest";

export type ExportErrorKind = "MalformedContent" | "RenderFailed";

export type OrchestratorErrorKind = "Busy" | "InvalidTransition" | "UnknownGroup";

export type ErrorKind =
  | ExtractionErrorKind
  | GatewayErrorKind
  | ExportErrorKind
  | OrchestratorErrorKind;

export type ErrorDetails = Record<string, unknown>;

const REMEDIATION: Record<ErrorKind, string> = {
  TooLarge: "Upload a smaller PDF, or split the book into parts.",
  NoExtractableText:
    "The PDF has no text layer (likely a scanned book). Run it through OCR and upload it again.",
  Corrupted: "The file could not be read as a PDF. Re-export it and upload it again.",
  PasswordProtected: "Remove the password protection from the PDF and upload it again.",
  InvalidCredential: "Check the API key for the configured provider.",
  QuotaExceeded: "The provider quota is exhausted. Wait for it to reset or raise the plan limits.",
  RateLimited: "The provider is rate limiting requests. Wait a minute and try again.",
  TransientNetwork: "The provider could not be reached. Check the network connection and try again.",
  ModelUnavailable: "The configured model is unavailable. Choose another model in the config.",
  MalformedResponse: "The provider returned an unusable response. Try again.",
  InvalidRequest: "The request was rejected by the provider. Check the input and try again.",
  MalformedContent: "The appendix is missing a title, body or timestamp. Regenerate it before exporting.",
  RenderFailed: "The file could not be rendered. Try another export format.",
  Busy: "Another operation is still running. Wait for it to finish.",
  InvalidTransition: "That action is not available at the current step.",
  UnknownGroup: "Pick a chapter group that exists in the planning table.",
};

export function remediationFor(kind: ErrorKind): string {
  return REMEDIATION[kind];
}

export interface PipelineErrorJSON {
  name: string;
  kind: ErrorKind;
  message: string;
  remediation: string;
  retryable: boolean;
  details?: ErrorDetails;
}

/**
 * Base class for every expected failure. Carries a machine-readable kind
 * and a human-actionable remediation hint.
 */
export abstract class PipelineError<K extends ErrorKind = ErrorKind> extends Error {
  readonly kind: K;
  readonly remediation: string;
  readonly retryable: boolean;
  readonly details?: ErrorDetails;

  protected constructor(
    kind: K,
    message: string,
    options: { retryable?: boolean; details?: ErrorDetails; remediation?: string; cause?: unknown } = {}
  ) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.kind = kind;
    this.remediation = options.remediation ?? REMEDIATION[kind];
    this.retryable = options.retryable ?? false;
    this.details = options.details;
  }

  toJSON(): PipelineErrorJSON {
    return {
      name: this.name,
      kind: this.kind,
      message: this.message,
      remediation: this.remediation,
      retryable: this.retryable,
      ...(this.details ? { details: this.details } : {}),
    };
  }
}

export class ExtractionError extends PipelineError<ExtractionErrorKind> {
  constructor(kind: ExtractionErrorKind, message: string, details?: ErrorDetails, cause?: unknown) {
    super(kind, message, { details, cause });
    this.name = "ExtractionError";
  }
}

export class GatewayError extends PipelineError<GatewayErrorKind> {
  constructor(
    kind: GatewayErrorKind,
    message: string,
    options: {
      details?: ErrorDetails;
      remediation?: string;
      cause?: unknown;
      retryable?: boolean;
    } = {}
  ) {
    super(kind, message, { ...options, retryable: options.retryable ?? isRetryableKind(kind) });
    this.name = "GatewayError";
  }
}

export class ExportError extends PipelineError<ExportErrorKind> {
  constructor(kind: ExportErrorKind, message: string, details?: ErrorDetails) {
    super(kind, message, { details });
    this.name = "ExportError";
  }
}

export class OrchestratorError extends PipelineError<OrchestratorErrorKind> {
  constructor(kind: OrchestratorErrorKind, message: string, details?: ErrorDetails) {
    super(kind, message, { details });
    this.name = "OrchestratorError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
