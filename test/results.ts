import { ServiceError, ServiceResult } from '../src/common/service-result';

export function expectOk<T>(result: ServiceResult<T>): T {
  if (!result.ok) {
    throw new Error(
      `Expected success, got ${result.error.kind}: ${result.error.message}`,
    );
  }
  return result.value;
}

export function expectFailure<T>(result: ServiceResult<T>): ServiceError {
  if (result.ok) {
    throw new Error('Expected a failure, got success');
  }
  return result.error;
}
