export enum HttpMethods {
  HEAD = "HEAD",
  GET = "GET",
  POST = "POST",
  PUT = "PUT",
  PATCH = "PATCH",
  DELETE = "DELETE",
  OPTIONS = "OPTIONS",
  TRACE = "TRACE",
}

export enum HttpStatusCode {
  CONTINUE = 100,
  OK = 200,
  NO_CONTENT = 204,
  NOT_MODIFIED = 304,
  BAD_REQUEST = 400,
  NOT_FOUND = 404,
  REQUEST_TIMEOUT = 408,
  PAYLOAD_TOO_LARGE = 413,
  HEADER_FIELDS_TOO_LARGE = 431,
  SERVER_ERROR = 500,
  NOT_IMPLEMENTED = 501,
  SERVICE_UNAVAILABLE = 503,
  VERSION_NOT_SUPPORTED = 505,
}

export enum ConnectionState {
  IDLE = "IDLE",
  READING_REQUEST = "READING_REQUEST",
  PROCESSING = "PROCESSING",
  WRITING_RESPONSE = "WRITING_RESPONSE",
  CLOSING = "CLOSING",
  CLOSED = "CLOSED",
}

export enum ConnectionEvent {
  DATA_RECEIVED = "DATA_RECEIVED",
  HEAD_COMPLETE = "HEAD_COMPLETE",
  RESPONSE_STARTED = "RESPONSE_STARTED",
  RESPONSE_COMPLETE = "RESPONSE_COMPLETE",
  NEXT_CYCLE = "NEXT_CYCLE",
  CLOSE = "CLOSE",
  TRANSPORT_CLOSED = "TRANSPORT_CLOSED",
}

export enum LifecycleState {
  NOT_STARTED = "NOT_STARTED",
  STARTING = "STARTING",
  SERVING = "SERVING",
  STOPPING = "STOPPING",
  STOPPED = "STOPPED",
}

export enum BodyFraming {
  NONE = "NONE",
  CONTENT_LENGTH = "CONTENT_LENGTH",
  CHUNKED = "CHUNKED",
}
