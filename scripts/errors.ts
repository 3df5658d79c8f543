/**
 * Error classes shared by the pipeline scripts.
 */

export class PipelineError extends Error {
  public readonly code: string;
  public readonly context?: Record<string, unknown>;

  constructor(message: string, code = "PIPELINE_ERROR", context?: Record<string, unknown>) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.context = context;
  }
}

/** Missing file, unsupported format or missing column in an input dataset. */
export class DatasetError extends PipelineError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "DATASET_ERROR", context);
  }
}

export class ConfigError extends PipelineError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "CONFIG_ERROR", context);
  }
}

/** The Places service answered with an error status (REQUEST_DENIED, OVER_QUERY_LIMIT, ...). */
export class PlacesApiError extends PipelineError {
  public readonly status: string;

  constructor(status: string, message?: string) {
    super(message ? `${status} (${message})` : status, "PLACES_API_ERROR", { status });
    this.status = status;
  }
}

/** The request never produced a usable response. */
export class PlacesTransportError extends PipelineError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "PLACES_TRANSPORT_ERROR", context);
  }
}

export function isCredentialError(err: PipelineError) {
  return /api key/i.test(err.message);
}
