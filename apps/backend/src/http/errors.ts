import type { ZodError } from "zod";

export type ErrorDetails = {
  formErrors: string[];
  fieldErrors: Record<string, string[]>;
};

export class HttpError extends Error {
  constructor(
    readonly statusCode: number,
    message: string
  ) {
    super(message);
    this.name = new.target.name;
  }

  toBody(): Record<string, unknown> {
    return { error: this.message };
  }
}

export class BadRequestError extends HttpError {
  constructor(message: string) {
    super(400, message);
  }
}

export class AuthenticationError extends HttpError {
  constructor(message = "Authentication credentials were not provided or are invalid") {
    super(401, message);
  }
}

export class PermissionDeniedError extends HttpError {
  constructor(message = "You do not have permission to perform this action.") {
    super(403, message);
  }
}

export class NotFoundError extends HttpError {
  constructor(message = "Not found") {
    super(404, message);
  }
}

export class ValidationError extends HttpError {
  constructor(readonly details: ErrorDetails) {
    super(400, "Validation failed");
  }

  static field(field: string, message: string): ValidationError {
    return new ValidationError({ formErrors: [], fieldErrors: { [field]: [message] } });
  }

  static form(message: string): ValidationError {
    return new ValidationError({ formErrors: [message], fieldErrors: {} });
  }

  static fromZod(err: ZodError): ValidationError {
    const flat = err.flatten();
    const fieldErrors: Record<string, string[]> = {};
    for (const [field, messages] of Object.entries(flat.fieldErrors)) {
      if (messages && messages.length > 0) fieldErrors[field] = messages;
    }
    return new ValidationError({ formErrors: flat.formErrors, fieldErrors });
  }

  override toBody(): Record<string, unknown> {
    return { error: this.message, details: this.details };
  }
}

/** Collects every failing field of an entity check before raising one ValidationError. */
export class Issues {
  private readonly formErrors: string[] = [];
  private readonly fieldErrors: Record<string, string[]> = {};

  add(field: string, message: string): this {
    const existing = this.fieldErrors[field];
    if (existing) existing.push(message);
    else this.fieldErrors[field] = [message];
    return this;
  }

  form(message: string): this {
    this.formErrors.push(message);
    return this;
  }

  get empty(): boolean {
    return this.formErrors.length === 0 && Object.keys(this.fieldErrors).length === 0;
  }

  throwIfAny(): void {
    if (!this.empty) {
      throw new ValidationError({ formErrors: this.formErrors, fieldErrors: this.fieldErrors });
    }
  }
}
