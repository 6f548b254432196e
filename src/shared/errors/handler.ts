/**
 * Error Handler
 *
 * Standardized error handling utilities for consistent error management.
 */

import { AppError, ErrorCategory, ErrorSeverity } from './types';

/**
 * Error handler class for managing errors throughout the library
 */
export class ErrorHandler {
  /**
   * Normalize anything thrown into an Error instance
   */
  static toError(error: unknown): Error {
    return error instanceof Error ? error : new Error(String(error));
  }

  /**
   * Create an unexpected error
   */
  static createUnexpectedError(
    error: unknown,
    context?: Record<string, unknown>
  ): AppError {
    const message = error instanceof Error ? error.message : String(error);
    return new AppError({
      category: ErrorCategory.UNEXPECTED,
      severity: ErrorSeverity.CRITICAL,
      userMessage: 'An unexpected error occurred. Please try again.',
      technicalDetails: message,
      timestamp: new Date(),
      context,
      recoverable: false,
      suggestedAction: 'If the problem persists, please contact support.'
    });
  }

  /**
   * Format error message for display to user
   */
  static formatUserMessage(error: AppError | Error): string {
    if (error instanceof AppError) {
      let message = error.userMessage;
      if (error.suggestedAction) {
        message += `\n\n${error.suggestedAction}`;
      }
      return message;
    }
    return error.message;
  }

  /**
   * Determine if an error is retryable
   */
  static isRetryable(error: Error | AppError): boolean {
    if (error instanceof AppError) {
      return error.recoverable && error.category === ErrorCategory.EXTERNAL_SERVICE;
    }

    const message = error.message.toLowerCase();
    return (
      message.includes('timeout') ||
      message.includes('network') ||
      message.includes('rate limit') ||
      message.includes('temporary')
    );
  }

  /**
   * Wrap an operation, converting anything it throws through the factory
   */
  static async handleAsync<T>(
    operation: () => Promise<T>,
    errorFactory: (error: unknown) => AppError
  ): Promise<T> {
    try {
      return await operation();
    } catch (error) {
      throw errorFactory(error);
    }
  }

  /**
   * Wrap a synchronous operation, converting anything it throws through the factory
   */
  static handle<T>(
    operation: () => T,
    errorFactory: (error: unknown) => AppError
  ): T {
    try {
      return operation();
    } catch (error) {
      throw errorFactory(error);
    }
  }
}
