import log from 'electron-log/node';
import type {
  ServiceResult,
  TextRequest,
  TextService,
} from '../../../shared/types/app.js';
import { errorMessage, isAbortError } from '../../errors.js';

export type Validation<T> =
  | { valid: true; value: T }
  | { valid: false; error: string };

export type Validator<T> = (value: unknown) => Validation<T>;

/**
 * Runs one structured request and folds every outcome into a ServiceResult.
 * Cancellation is the only thing that escapes as an exception.
 */
export async function callStructured<T>({
  service,
  request,
  validate,
  operationId,
}: {
  service: TextService;
  request: TextRequest;
  validate: Validator<T>;
  operationId: string;
}): Promise<ServiceResult<T>> {
  let raw: string;
  try {
    raw = await service.generate(request);
  } catch (error) {
    if (isAbortError(error) || request.signal?.aborted) {
      throw new DOMException('Operation cancelled', 'AbortError');
    }
    log.debug(
      `[${operationId}] ${request.schema.name} call failed: ${errorMessage(error)}`
    );
    return { ok: false, kind: 'transport-error', message: errorMessage(error) };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    return {
      ok: false,
      kind: 'schema-error',
      message: `Response is not valid JSON: ${errorMessage(error)}`,
    };
  }

  const validated = validate(parsed);
  if (!validated.valid) {
    log.debug(
      `[${operationId}] ${request.schema.name} failed validation: ${validated.error}`
    );
    return { ok: false, kind: 'schema-error', message: validated.error };
  }
  return { ok: true, value: validated.value };
}
