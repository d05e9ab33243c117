export class HttpError extends Error {
  constructor(message: string, public readonly statusCode: number = 500) {
    super(message);
    this.name = "HttpError";
  }
}

export class NotFoundError extends HttpError {
  constructor(message: string) {
    super(message, 404);
    this.name = "NotFoundError";
  }
}

export class BadRequestError extends HttpError {
  constructor(message: string) {
    super(message, 400);
    this.name = "BadRequestError";
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export class StoreLoadError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "StoreLoadError";
  }
}
