import {
  ExceptionFilter,
  Catch,
  ArgumentsHost,
  HttpException,
  HttpStatus,
  Logger,
} from "@nestjs/common";
import { Response } from "express";
import { ErrorResponseDto } from "../dto/error-response.dto";

/**
 * Global exception filter that formats all errors into a consistent structure.
 * Only exceptions with structured ErrorResponseDto responses are returned to clients.
 * Unexpected exceptions are logged and return a generic 500 error.
 */
@Catch()
export class HttpExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(HttpExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const response = host.switchToHttp().getResponse<Response>();

    if (exception instanceof HttpException) {
      const exceptionResponse = exception.getResponse();
      if (isStructuredErrorResponse(exceptionResponse)) {
        const body: ErrorResponseDto = {
          error: exceptionResponse.error,
          code: exceptionResponse.code,
        };
        response.status(exception.getStatus()).json(body);
        return;
      }
    }

    this.logger.error(
      "Unexpected error format",
      exception instanceof Error ? exception.stack : String(exception),
    );
    const body: ErrorResponseDto = {
      error: "Internal server error",
      code: HttpStatus[HttpStatus.INTERNAL_SERVER_ERROR],
    };
    response.status(HttpStatus.INTERNAL_SERVER_ERROR).json(body);
  }
}

function isStructuredErrorResponse(
  response: unknown,
): response is ErrorResponseDto {
  return (
    typeof response === "object" &&
    response !== null &&
    "code" in response &&
    "error" in response &&
    typeof response.code === "string" &&
    typeof response.error === "string"
  );
}
