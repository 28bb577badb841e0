import axios from 'axios';

export class ConfigurationError extends Error {
  readonly missing: string[];

  constructor(message: string, missing: string[] = []) {
    super(message);
    this.name = 'ConfigurationError';
    this.missing = missing;
  }
}

/**
 * A failed call to Jira or GitHub: a non-2xx response, a timeout or a
 * network error.
 */
export class ApiError extends Error {
  readonly operation: string;
  readonly status?: number;
  readonly body?: unknown;

  constructor(operation: string, message: string, status?: number, body?: unknown) {
    super(message);
    this.name = 'ApiError';
    this.operation = operation;
    this.status = status;
    this.body = body;
  }

  static fromResponse(operation: string, status: number, body: unknown): ApiError {
    return new ApiError(operation, `${operation} failed with HTTP ${status}`, status, body);
  }

  static fromError(operation: string, error: unknown): ApiError {
    if (axios.isAxiosError(error)) {
      const reason = error.code === 'ECONNABORTED' ? 'timed out' : error.message;
      return new ApiError(operation, `${operation} failed: ${reason}`, error.response?.status, error.response?.data);
    }
    const message = error instanceof Error ? error.message : String(error);
    return new ApiError(operation, `${operation} failed: ${message}`);
  }

  /**
   * Message plus the response body, for log lines.
   */
  describe(): string {
    if (this.body === undefined || this.body === '') {
      return this.message;
    }
    const body = typeof this.body === 'string' ? this.body : JSON.stringify(this.body);
    return `${this.message} - response: ${body}`;
  }
}
