export class AppError extends Error {
  constructor(
    public readonly statusCode: number,
    public readonly code: string,
    message: string,
    public readonly details?: unknown,
  ) {
    super(message);
    this.name = "AppError";
  }

  static badRequest(code: string, message: string, details?: unknown): AppError {
    return new AppError(400, code, message, details);
  }

  static notFound(resource: string): AppError {
    return new AppError(404, "NOT_FOUND", `${resource} not found`);
  }

  static internal(message = "Internal server error", code = "INTERNAL_ERROR"): AppError {
    return new AppError(500, code, message);
  }

  static serviceUnavailable(service: string, details?: unknown): AppError {
    return new AppError(503, "SERVICE_UNAVAILABLE", `${service} is currently unavailable`, details);
  }

  toJSON(): { error: string; code: string; details?: unknown } {
    const body: { error: string; code: string; details?: unknown } = {
      error: this.message,
      code: this.code,
    };
    if (this.details !== undefined) {
      body.details = this.details;
    }
    return body;
  }
}

/** Raised where a coordinate is built from a value that is not a real number */
export class InvalidCoordinateError extends AppError {
  readonly kind = "InvalidCoordinate";

  constructor(lat: unknown, lng?: unknown) {
    const text = lng === undefined ? String(lat) : `${String(lat)},${String(lng)}`;
    super(400, "INVALID_COORDINATE", `Invalid coordinate "${text}"`, { lat, lng });
    this.name = "InvalidCoordinateError";
  }
}
