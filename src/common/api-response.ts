import { HttpStatus } from '@nestjs/common';

export class ApiResponse<T = unknown> {
  constructor(
    public readonly success: boolean,
    public readonly statusCode: number,
    public readonly message: string,
    public readonly data: T,
  ) {}

  static success<T>(
    data: T,
    message = 'Request completed successfully',
    statusCode: number = HttpStatus.OK,
  ): ApiResponse<T> {
    return new ApiResponse(true, statusCode, message, data);
  }
}
