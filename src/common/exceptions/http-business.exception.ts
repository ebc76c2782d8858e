import { ErrorCode, ErrorCodeEnum } from '@/shared/constants/error-code.constant';
import { HttpException } from '@nestjs/common';

export class HttpBusinessException extends HttpException {
  constructor(
    public readonly errorCode: ErrorCodeEnum,
    userMessage?: string,
  ) {
    const [message, status] = ErrorCode[errorCode];
    super(
      {
        error_code: errorCode,
        user_message: userMessage ?? message,
      },
      status,
    );
  }
}
