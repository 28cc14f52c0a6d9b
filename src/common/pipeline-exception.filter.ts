import { ArgumentsHost, Catch, ExceptionFilter, HttpStatus, Logger } from '@nestjs/common';
import { Response } from 'express';
import {
    AccessDeniedError,
    DocumentNotFoundError,
    IngestionError,
    InvalidSubmissionError,
    StageTimeoutError,
    TurnFailedError,
} from '../utils/errors';

export type DomainError =
    | AccessDeniedError
    | DocumentNotFoundError
    | InvalidSubmissionError
    | TurnFailedError
    | StageTimeoutError
    | IngestionError;

export interface HttpErrorBody {
    statusCode: number;
    error: string;
    message: string;
}

export function toHttpError(error: DomainError): HttpErrorBody {
    if (error instanceof AccessDeniedError) {
        return { statusCode: HttpStatus.FORBIDDEN, error: 'AccessDenied', message: error.message };
    }
    if (error instanceof DocumentNotFoundError) {
        return { statusCode: HttpStatus.NOT_FOUND, error: 'DocumentNotFound', message: error.message };
    }
    if (error instanceof InvalidSubmissionError) {
        return { statusCode: HttpStatus.BAD_REQUEST, error: 'InvalidSubmission', message: error.message };
    }
    if (error instanceof TurnFailedError) {
        return { statusCode: HttpStatus.BAD_GATEWAY, error: 'TurnFailed', message: error.message };
    }
    // stage errors and ingestion errors only reach here when thrown outside a turn
    return {
        statusCode: HttpStatus.INTERNAL_SERVER_ERROR,
        error: 'InternalError',
        message: 'Internal server error'
    };
}

@Catch(AccessDeniedError, DocumentNotFoundError, InvalidSubmissionError, TurnFailedError, StageTimeoutError, IngestionError)
export class PipelineExceptionFilter implements ExceptionFilter<DomainError> {
    private readonly logger = new Logger(PipelineExceptionFilter.name);

    catch(exception: DomainError, host: ArgumentsHost): void {
        const body = toHttpError(exception);
        if (body.statusCode >= HttpStatus.INTERNAL_SERVER_ERROR) {
            this.logger.error(`${exception.name}: ${exception.message}`, exception.stack);
        }
        const response = host.switchToHttp().getResponse<Response>();
        response.status(body.statusCode).json(body);
    }
}
