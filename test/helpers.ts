import { ValidationError } from "../src/errors";
import { TransformResponse, TransformResult } from "../src/pipeline";

/** Field named by the ValidationError `fn` throws. */
export function validationField(fn: () => unknown): string {
  try {
    fn();
  } catch (err) {
    if (err instanceof ValidationError) return err.field;
    throw err;
  }
  throw new Error("expected a ValidationError");
}

export function expectOk(response: TransformResponse): TransformResult {
  if (response.status !== "ok") {
    throw new Error(`expected an ok response, got: ${response.message}`);
  }
  return response;
}

export function errorMessage(response: TransformResponse): string {
  if (response.status !== "error") {
    throw new Error("expected an error response");
  }
  return response.message;
}
