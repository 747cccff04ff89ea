import { HttpStatusCode } from "../enums";

export class HttpError extends Error {
  readonly statusCode: HttpStatusCode;

  constructor(statusCode: HttpStatusCode, message: string) {
    super(message);
    this.name = "HttpError";
    this.statusCode = statusCode;
  }
}

// the transport went away, or the exchange was abandoned by the connection
export class ClientDisconnectedError extends Error {
  constructor(message = "Client disconnected") {
    super(message);
    this.name = "ClientDisconnectedError";
  }
}

export class ResponseContractError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ResponseContractError";
  }
}

export class StartupError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "StartupError";
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}
