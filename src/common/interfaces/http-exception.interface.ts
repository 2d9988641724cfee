export interface HttpExceptionResponse {
  statusCode: number;
  message: string | string[];
  error?: string;
  timestamp?: string;
  path?: string;
}

// One failed check on one input field
export interface FieldViolation {
  property: string;
  constraints: Record<string, string>;
}
