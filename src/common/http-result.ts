import {
  BadRequestException,
  HttpException,
  InternalServerErrorException,
  NotFoundException,
} from '@nestjs/common';
import { ServiceError, ServiceResult } from './service-result';

export function toHttpException(error: ServiceError): HttpException {
  switch (error.kind) {
    case 'validation':
      return new BadRequestException(error.message);
    case 'not_found':
      return new NotFoundException(error.message);
    case 'persistence':
      return error.rejected
        ? new BadRequestException(error.message)
        : new InternalServerErrorException(error.message);
    case 'internal':
      return new InternalServerErrorException(error.message);
  }
}

/** Returns the value of a successful result, or throws the matching HTTP error. */
export function unwrapResult<T>(result: ServiceResult<T>): T {
  if (result.ok) {
    return result.value;
  }
  throw toHttpException(result.error);
}
