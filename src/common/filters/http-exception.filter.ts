import {
  ExceptionFilter,
  Catch,
  ArgumentsHost,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import { FastifyReply } from 'fastify';
import { ApiResponse, ErrorCode } from '../interfaces/response.interface';
import { PipelineError } from '../errors/pipeline.errors';
import { isRecord } from '../utils/guards';

@Catch()
export class HttpExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(HttpExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost) {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<FastifyReply>();

    let status: number = HttpStatus.INTERNAL_SERVER_ERROR;
    let errorCode: string = ErrorCode.INTERNAL_ERROR;
    let message = 'Internal server error';
    let details: Record<string, unknown> | undefined;

    if (exception instanceof HttpException) {
      status = exception.getStatus();
      const exceptionResponse = exception.getResponse();

      if (isRecord(exceptionResponse)) {
        const resp = exceptionResponse;
        // ValidationPipe 的 message 是数组
        message = Array.isArray(resp.message)
          ? resp.message.join('; ')
          : typeof resp.message === 'string'
            ? resp.message
            : exception.message;
        errorCode = typeof resp.code === 'string' ? resp.code : this.mapStatusToErrorCode(status);
        details = isRecord(resp.details) ? resp.details : undefined;
      } else {
        message = typeof exceptionResponse === 'string' ? exceptionResponse : exception.message;
        errorCode = this.mapStatusToErrorCode(status);
      }
    } else if (exception instanceof PipelineError) {
      status = this.mapPipelineErrorToStatus(exception.code);
      errorCode = exception.code;
      message = exception.message;
      this.logger.warn(`Pipeline error ${exception.code}: ${exception.message}`);
    } else if (exception instanceof Error) {
      message = exception.message;
      this.logger.error(`Unhandled error: ${exception.message}`, exception.stack);
    }

    const errorResponse: ApiResponse = {
      data: null,
      error: {
        code: errorCode,
        message,
        ...(details && { details }),
      },
    };

    response.status(status).send(errorResponse);
  }

  private mapStatusToErrorCode(status: number): ErrorCode {
    switch (status) {
      case HttpStatus.BAD_REQUEST:
        return ErrorCode.INVALID_INPUT;
      case HttpStatus.NOT_FOUND:
        return ErrorCode.NOT_FOUND;
      case HttpStatus.CONFLICT:
        return ErrorCode.CONFLICT;
      default:
        return ErrorCode.INTERNAL_ERROR;
    }
  }

  private mapPipelineErrorToStatus(code: ErrorCode): number {
    switch (code) {
      case ErrorCode.DECODE_ERROR:
        return HttpStatus.UNPROCESSABLE_ENTITY;
      case ErrorCode.ABORTED:
        return HttpStatus.CONFLICT;
      case ErrorCode.BACKEND_ERROR:
      case ErrorCode.TRANSCRIPTION_FAILED:
        return HttpStatus.BAD_GATEWAY;
      default:
        return HttpStatus.INTERNAL_SERVER_ERROR;
    }
  }
}
