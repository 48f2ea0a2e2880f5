import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  Logger,
} from '@nestjs/common';
import { Response } from 'express';
import { AppError } from '../errors';

export interface AppErrorBody {
  statusCode: number;
  error: string;
  message: string;
}

/**
 * Maps the application error taxonomy onto HTTP responses
 */
@Catch(AppError)
export class AppErrorFilter implements ExceptionFilter<AppError> {
  private readonly logger = new Logger(AppErrorFilter.name);

  catch(exception: AppError, host: ArgumentsHost): void {
    const response = host.switchToHttp().getResponse<Response>();
    const body = AppErrorFilter.toBody(exception);

    if (exception.statusCode >= 500) {
      this.logger.error(
        `${exception.code}: ${exception.message}`,
        exception.originalError?.stack ?? exception.stack,
      );
    } else {
      this.logger.warn(`${exception.code}: ${exception.message}`);
    }

    response.status(exception.statusCode).json(body);
  }

  static toBody(exception: AppError): AppErrorBody {
    return {
      statusCode: exception.statusCode,
      error: exception.code,
      message: exception.message,
    };
  }
}
