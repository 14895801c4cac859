export class ConnectionError extends Error {
  url?: string;
  /** WebSocket close code when an open channel dropped; absent for handshake failures. */
  closeCode?: number;

  constructor(message: string, options: { url?: string; closeCode?: number; cause?: unknown } = {}) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = "ConnectionError";
    this.url = options.url;
    this.closeCode = options.closeCode;
  }
}

export class OracleError extends Error {
  status?: number;
  code?: string;
  retryable: boolean;
  timedOut: boolean;
  retryCount: number;
  responseBody?: unknown;

  constructor(message: string, options: {
    status?: number;
    code?: string;
    retryable?: boolean;
    timedOut?: boolean;
    retryCount?: number;
    responseBody?: unknown;
  } = {}) {
    super(message);
    this.name = "OracleError";
    this.status = options.status;
    this.code = options.code;
    this.retryable = options.retryable ?? false;
    this.timedOut = options.timedOut ?? false;
    this.retryCount = options.retryCount ?? 0;
    this.responseBody = options.responseBody;
  }
}

/** Structured oracle output that could not be decoded into the expected contract. */
export class ParseError extends Error {
  raw: string;

  constructor(message: string, raw: string) {
    super(message);
    this.name = "ParseError";
    this.raw = raw;
  }
}

export class ProtocolError extends Error {
  details: string[];

  constructor(message: string, details: string[] = []) {
    super(details.length > 0 ? `${message}: ${details.join("; ")}` : message);
    this.name = "ProtocolError";
    this.details = details;
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
