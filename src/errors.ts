export class ApiError extends Error {
  constructor(public readonly statusCode: number, message: string) {
    super(message);
    this.name = new.target.name;
  }
}

// Malformed id or request body
export class DecodeError extends ApiError {
  constructor(message = 'Invalid JSON format') {
    super(400, message);
  }
}

// Missing required field
export class ValidationError extends ApiError {
  constructor(message = 'Name and email are required') {
    super(400, message);
  }
}

export class NotFoundError extends ApiError {
  constructor(message = 'User not found') {
    super(404, message);
  }
}

export class MethodNotAllowedError extends ApiError {
  constructor(public readonly allowed: string[]) {
    super(405, 'Method not allowed');
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}
