export class HttpError extends Error {
  constructor(
    public readonly status: number,
    message: string
  ) {
    super(message);
    this.name = 'HttpError';
  }
}

export class NotFoundError extends HttpError {
  constructor(message: string) {
    super(404, message);
    this.name = 'NotFoundError';
  }
}

export type RequestLocation = 'body' | 'query' | 'params';

export interface FieldError {
  location: RequestLocation;
  field: string;
  message: string;
  code: string;
}

export class ValidationError extends HttpError {
  constructor(public readonly details: FieldError[]) {
    super(422, 'Validation failed');
    this.name = 'ValidationError';
  }
}

export function taskNotFound(id: number | string): NotFoundError {
  return new NotFoundError(`Task with id ${id} not found`);
}
