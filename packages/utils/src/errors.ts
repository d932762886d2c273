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

export class ValidationError extends AppError {
  constructor(
    message = "Validation failed",
    public details?: Record<string, string[]>,
  ) {
    super(400, "VALIDATION_ERROR", message);
    this.name = "ValidationError";
  }
}

/** The upload was accepted but its content could not be read as a document. */
export class UnprocessableDocumentError extends AppError {
  constructor(message = "Could not read document") {
    super(422, "UNPROCESSABLE_DOCUMENT", message);
    this.name = "UnprocessableDocumentError";
  }
}

export class ConverterUnavailableError extends AppError {
  constructor(message = "Document converter is not available") {
    super(500, "CONVERTER_UNAVAILABLE", message);
    this.name = "ConverterUnavailableError";
  }
}

export class ConversionFailedError extends AppError {
  constructor(
    message = "Document conversion failed",
    public stderr?: string,
  ) {
    super(500, "CONVERSION_FAILED", message);
    this.name = "ConversionFailedError";
  }
}
