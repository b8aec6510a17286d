export class HttpError extends Error {
  readonly statusCode: number;

  constructor(statusCode: number, message: string) {
    super(message);
    this.name = "HttpError";
    this.statusCode = statusCode;
  }
}

export class NotFoundError extends HttpError {
  constructor(message = "not found") {
    super(404, message);
    this.name = "NotFoundError";
  }
}

export class InvalidOperationError extends HttpError {
  constructor(message = "invalid operation") {
    super(400, message);
    this.name = "InvalidOperationError";
  }
}

export class StreamingSendError extends Error {
  constructor(message = "subscriber is not connected") {
    super(message);
    this.name = "StreamingSendError";
  }
}
