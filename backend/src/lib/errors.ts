export class AppError extends Error {
  constructor(
    public statusCode: number,
    public code: string,
    message: string,
  ) {
    super(message);
    this.name = "AppError";
  }
}

export class ConflictError extends AppError {
  constructor(message = "Resource conflict") {
    super(409, "CONFLICT", message);
  }
}

export class RateLimitError extends AppError {
  constructor(message = "Rate limit exceeded") {
    super(429, "RATE_LIMITED", message);
  }
}

export class ValidationError extends AppError {
  constructor(message = "Validation failed") {
    super(422, "VALIDATION_ERROR", message);
  }
}

// Connection failure or non-success status on the streaming call.
export class TransportError extends AppError {
  constructor(
    message = "Upstream model request failed",
    public upstreamStatus?: number,
  ) {
    super(502, "UPSTREAM_ERROR", message);
  }
}

// Kept apart from TransportError so callers can offer the fallback model.
export class QuotaExhaustedError extends AppError {
  constructor(
    public model: string,
    message = "The service is temporarily unavailable due to high demand. Please try again with the fallback model.",
  ) {
    super(429, "QUOTA_EXHAUSTED", message);
  }
}

export class EmptyResponseError extends AppError {
  constructor(message = "No response received. Please try again.") {
    super(502, "EMPTY_RESPONSE", message);
  }
}
