import Database from 'better-sqlite3';
import { WordNetError, type WordNetErrorKind } from '../../domain/errors';
import type { ILogger } from '../logging/logger';
import { Result } from '../result/result';

/**
 * Error types for better error categorization
 */
export enum ErrorType {
	DISAMBIGUATION = 'DISAMBIGUATION',
	DECODING = 'DECODING',
	DOMAIN = 'DOMAIN',
	STORAGE = 'STORAGE',
	SYSTEM = 'SYSTEM'
}

const TYPE_BY_KIND: Record<WordNetErrorKind, ErrorType> = {
	disambiguation: ErrorType.DISAMBIGUATION,
	decoding: ErrorType.DECODING,
	domain: ErrorType.DOMAIN,
	store: ErrorType.STORAGE
};

/**
 * Structured error information
 */
export interface ErrorInfo {
	type: ErrorType;
	code: string;
	message: string;
	context?: Record<string, unknown>;
	originalError: Error;
}

/**
 * Unified error handler for consistent error management across services
 */
export class ErrorHandler {
	constructor(private readonly logger: ILogger) {}

	/**
	 * Handle and log an error, returning a failed Result that carries the
	 * original error so callers can still inspect it
	 */
	handleError<T>(
		error: unknown,
		operation: string,
		context?: Record<string, unknown>
	): Result<T> {
		const errorInfo = this.createErrorInfo(error, operation, context);
		this.logError(errorInfo);
		return Result.failure(errorInfo.originalError);
	}

	/**
	 * Safely execute a synchronous operation with error handling
	 */
	execute<T>(
		operation: () => T,
		operationName: string,
		context?: Record<string, unknown>
	): Result<T> {
		try {
			return Result.success(operation());
		} catch (error) {
			return this.handleError(error, operationName, context);
		}
	}

	/**
	 * Classify an error by its kind; SQLite engine faults count as storage errors
	 */
	classify(error: unknown): ErrorType {
		if (error instanceof WordNetError) {
			return TYPE_BY_KIND[error.kind];
		}
		return error instanceof Database.SqliteError ? ErrorType.STORAGE : ErrorType.SYSTEM;
	}

	/**
	 * Create structured error information
	 */
	private createErrorInfo(
		error: unknown,
		operation: string,
		context?: Record<string, unknown>
	): ErrorInfo {
		const type = this.classify(error);
		const originalError = error instanceof Error ? error : new Error(String(error));
		return {
			type,
			code: `${type}_${operation.toUpperCase().replace(/\W+/g, '_')}_FAILED`,
			message: `Failed to ${operation}: ${originalError.message}`,
			context,
			originalError
		};
	}

	/**
	 * Log error with appropriate level based on type
	 */
	private logError(errorInfo: ErrorInfo): void {
		const logContext = {
			type: errorInfo.type,
			code: errorInfo.code,
			context: errorInfo.context,
			error: errorInfo.originalError.message,
			stack: errorInfo.originalError.stack
		};

		// Caller mistakes are warnings; store and unexpected faults are errors
		switch (errorInfo.type) {
			case ErrorType.DISAMBIGUATION:
			case ErrorType.DOMAIN:
			case ErrorType.DECODING:
				this.logger.warn(errorInfo.message, logContext);
				break;
			case ErrorType.STORAGE:
			case ErrorType.SYSTEM:
			default:
				this.logger.error(errorInfo.message, logContext);
				break;
		}
	}
}
