export class ApiError extends Error {
  statusCode: number;
  details?: unknown;

  constructor(statusCode: number, message: string, details?: unknown) {
    super(message);
    this.name = "ApiError";
    this.statusCode = statusCode;
    this.details = details;
  }

  get isServerError() {
    return this.statusCode >= 500;
  }
}

export const notFound = (resource: string) => new ApiError(404, `${resource} not found`);

export const insufficientGemstones = (required: number, balance: number) =>
  new ApiError(402, "Insufficient gemstones", { required, balance });

/** A backing store (Postgres over Supabase, object storage) rejected the call. */
export const storeUnavailable = (store: string) => new ApiError(500, `${store} is unavailable`);

/** The model answered but not with something usable. */
export const upstreamRejected = (message: string, details?: unknown) => new ApiError(502, message, details);
