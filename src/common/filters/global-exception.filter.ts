import {
  type ArgumentsHost,
  Catch,
  type ExceptionFilter,
  HttpException,
  HttpStatus,
  Logger,
} from "@nestjs/common";
import { HttpAdapterHost } from "@nestjs/core";
import type { Request } from "express";
import type {
  ApplicationProblemDetails,
  FieldError,
} from "../errors/problem-details.interface";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isFieldError(value: unknown): value is FieldError {
  return isRecord(value) && typeof value.field === "string" && typeof value.message === "string";
}

function readString(record: Record<string, unknown>, key: string): string | undefined {
  const value = record[key];
  return typeof value === "string" ? value : undefined;
}

function statusName(status: number): string {
  return HttpStatus[status] ?? "ERROR";
}

/**
 * Global exception filter that catches all exceptions in the application and
 * replies with an RFC 7807 problem details body.
 *
 * - AppException responses are already problem details and pass through.
 * - Other HttpExceptions (NotFoundException, BadRequestException, ...) are
 *   normalised, keeping their message and any field errors.
 * - Anything else becomes a 500 without leaking internals.
 */
@Catch()
export class GlobalExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(GlobalExceptionFilter.name);

  constructor(private readonly httpAdapterHost: HttpAdapterHost) {}

  catch(exception: unknown, host: ArgumentsHost): void {
    const { httpAdapter } = this.httpAdapterHost;

    const ctx = host.switchToHttp();
    const request = ctx.getRequest<Request>();
    const instance = httpAdapter.getRequestUrl(request);

    const problem = this.toProblemDetails(exception, instance);

    this.logError(exception, request, problem);

    httpAdapter.reply(ctx.getResponse(), problem, problem.status);
  }

  private toProblemDetails(exception: unknown, instance: string): ApplicationProblemDetails {
    if (!(exception instanceof HttpException)) {
      const status = HttpStatus.INTERNAL_SERVER_ERROR;
      return {
        type: statusName(status),
        title: statusName(status),
        status,
        detail: "An unexpected error occurred",
        instance,
      };
    }

    const status = exception.getStatus();
    const response = exception.getResponse();

    if (!isRecord(response)) {
      return {
        type: statusName(status),
        title: statusName(status),
        status,
        detail: typeof response === "string" ? response : exception.message,
        instance,
      };
    }

    const message = response.message;
    const detail =
      readString(response, "detail") ??
      (Array.isArray(message) ? message.map(String).join("; ") : undefined) ??
      readString(response, "message") ??
      exception.message;
    const errorCode = readString(response, "errorCode");
    const errors = Array.isArray(response.errors) ? response.errors.filter(isFieldError) : [];
    const details = isRecord(response.details) ? response.details : undefined;

    return {
      type: readString(response, "type") ?? errorCode ?? statusName(status),
      title: readString(response, "title") ?? statusName(status),
      status,
      detail,
      instance,
      ...(errorCode && { errorCode }),
      ...(errors.length > 0 && { errors }),
      ...(details && { details }),
    };
  }

  private logError(exception: unknown, request: Request, problem: ApplicationProblemDetails): void {
    const prefix = problem.errorCode ? `[${problem.errorCode}] ` : "";
    const route = `${request.method ?? "unknown"} ${request.url ?? "unknown"}`;

    if (problem.status >= 500) {
      if (exception instanceof Error) {
        this.logger.error(`${prefix}${route} - ${exception.message}`, exception.stack);
      } else {
        this.logger.error(`${prefix}${route} - Unknown error`, String(exception));
      }
    } else if (problem.status >= 400) {
      this.logger.warn(`${prefix}${route} - ${problem.detail}`);
    }
  }
}
