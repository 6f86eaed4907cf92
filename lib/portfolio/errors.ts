export type PortfolioErrorKind =
  | "MissingInput"
  | "MalformedResponse"
  | "MissingField"
  | "TransportFailure";

type PortfolioErrorDetail = {
  /** Empty form fields, for MissingInput. */
  fields?: string[];
  /** Bare key name, for MissingField. */
  field?: string;
  /** Location of the missing key, e.g. `portfolio[2].allocation`. */
  path?: string;
  /** Completion text that failed to parse. */
  raw?: string;
  cause?: unknown;
};

export class PortfolioError extends Error {
  readonly kind: PortfolioErrorKind;
  readonly fields?: string[];
  readonly field?: string;
  readonly path?: string;
  readonly raw?: string;

  constructor(kind: PortfolioErrorKind, message: string, detail: PortfolioErrorDetail = {}) {
    super(message, detail.cause === undefined ? undefined : { cause: detail.cause });
    this.name = "PortfolioError";
    this.kind = kind;
    this.fields = detail.fields;
    this.field = detail.field;
    this.path = detail.path;
    this.raw = detail.raw;
  }
}

export function isPortfolioError(error: unknown): error is PortfolioError {
  return error instanceof PortfolioError;
}

export type ErrorBody = {
  error: {
    kind: PortfolioErrorKind | "Internal";
    message: string;
    fields?: string[];
    field?: string;
    path?: string;
    raw?: string;
  };
};

const STATUS_BY_KIND: Record<PortfolioErrorKind, number> = {
  MissingInput: 400,
  MalformedResponse: 502,
  MissingField: 502,
  TransportFailure: 502,
};

// Converts anything thrown inside the workflow into a response body + status.
export function toErrorBody(error: unknown): { status: number; body: ErrorBody } {
  if (isPortfolioError(error)) {
    return {
      status: STATUS_BY_KIND[error.kind],
      body: {
        error: {
          kind: error.kind,
          message: error.message,
          fields: error.fields,
          field: error.field,
          path: error.path,
          raw: error.raw,
        },
      },
    };
  }

  const message = error instanceof Error ? error.message : String(error);
  return {
    status: 500,
    body: { error: { kind: "Internal", message } },
  };
}
