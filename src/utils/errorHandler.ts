/**
 * Centralized error handling for the checklist dropdown library.
 * Provides error categorization, user-facing messages, and logging.
 */

export enum ErrorCategory {
  CONFIGURATION = 'CONFIGURATION',
  RENDER = 'RENDER',
  CALLBACK = 'CALLBACK',
  UNKNOWN = 'UNKNOWN',
}

export enum ErrorSeverity {
  /** The widget kept working; one host action failed. */
  WARNING = 'warning',
  ERROR = 'error',
  /** The widget cannot work with the configuration it was given. */
  CRITICAL = 'critical',
}

export interface ErrorDetails {
  message: string;
  category: ErrorCategory;
  severity: ErrorSeverity;
  originalError?: unknown;
  context?: Record<string, unknown>;
  timestamp: Date;
  userMessage: string;
  suggestions: string[];
}

export interface ErrorHandlerOptions {
  enableLogging?: boolean;
  logToConsole?: boolean;
  defaultSeverity?: ErrorSeverity;
  customHandlers?: Map<ErrorCategory, (error: ErrorDetails) => void>;
}

export class ErrorHandler {
  private options: ErrorHandlerOptions;
  private errorListeners: Set<(error: ErrorDetails) => void> = new Set();
  private errorHistory: ErrorDetails[] = [];
  private readonly maxHistorySize = 50;

  constructor(options: ErrorHandlerOptions = {}) {
    this.options = {
      enableLogging: true,
      logToConsole: true,
      defaultSeverity: ErrorSeverity.ERROR,
      ...options,
    };
  }

  /**
   * Categorizes an error from its type, its message and the phase it was
   * reported from.
   */
  private categorizeError(error: unknown, context?: Record<string, unknown>): ErrorCategory {
    const lowerError = this.getErrorString(error).toLowerCase();

    // Thrown by a host intent callback (onToggleItem, onStateChange, onSetAll)
    if (context?.phase === 'callback') {
      return ErrorCategory.CALLBACK;
    }

    // Host passed something other than a function or item where one was expected
    if (
      error instanceof TypeError ||
      lowerError.includes('is not a function') ||
      lowerError.includes('cannot read properties of')
    ) {
      return ErrorCategory.CONFIGURATION;
    }

    if (context?.phase === 'render') {
      return ErrorCategory.RENDER;
    }

    return ErrorCategory.UNKNOWN;
  }

  private getUserMessage(category: ErrorCategory, originalMessage: string): string {
    switch (category) {
      case ErrorCategory.CONFIGURATION:
        return 'The checklist configuration is invalid.';
      case ErrorCategory.RENDER:
        return 'Unable to display checklist.';
      case ErrorCategory.CALLBACK:
        return 'The checklist action could not be completed.';
      default:
        return originalMessage || 'An unexpected error occurred.';
    }
  }

  private getSuggestions(category: ErrorCategory): string[] {
    switch (category) {
      case ErrorCategory.CONFIGURATION:
        return [
          'Build the configuration with makeConfig or makeCustomConfig',
          'Check that itemLabel and itemChecked accept every item in the list',
        ];
      case ErrorCategory.RENDER:
        return ['Check the items passed to the checklist'];
      case ErrorCategory.CALLBACK:
        return ['Check the onToggleItem, onStateChange and onSetAll callbacks'];
      default:
        return [];
    }
  }

  private getErrorString(error: unknown): string {
    if (typeof error === 'string') return error;
    if (error instanceof Error) return error.message;
    if (error && typeof error === 'object' && 'message' in error) {
      return String(error.message);
    }
    return String(error);
  }

  private getSeverity(category: ErrorCategory): ErrorSeverity {
    switch (category) {
      case ErrorCategory.CONFIGURATION:
        return ErrorSeverity.CRITICAL;
      case ErrorCategory.RENDER:
        return ErrorSeverity.ERROR;
      case ErrorCategory.CALLBACK:
        return ErrorSeverity.WARNING;
      default:
        return this.options.defaultSeverity ?? ErrorSeverity.ERROR;
    }
  }

  public handle(
    error: unknown,
    context?: Record<string, unknown>,
    customMessage?: string
  ): ErrorDetails {
    const errorString = this.getErrorString(error);
    const category = this.categorizeError(error, context);

    const errorDetails: ErrorDetails = {
      message: errorString,
      category,
      severity: this.getSeverity(category),
      originalError: error,
      context,
      timestamp: new Date(),
      userMessage: customMessage ?? this.getUserMessage(category, errorString),
      suggestions: this.getSuggestions(category),
    };

    this.logError(errorDetails);
    this.addToHistory(errorDetails);
    this.notifyListeners(errorDetails);

    const customHandler = this.options.customHandlers?.get(category);
    if (customHandler) {
      customHandler(errorDetails);
    }

    return errorDetails;
  }

  private logError(error: ErrorDetails): void {
    if (!this.options.enableLogging || !this.options.logToConsole) return;

    console.groupCollapsed(`[${error.severity.toUpperCase()}] ${error.category}`);
    console.error('Message:', error.userMessage);
    console.error('Technical:', error.message);
    if (error.context) console.error('Context:', error.context);
    if (error.suggestions.length) console.error('Suggestions:', error.suggestions);
    console.groupEnd();
  }

  private addToHistory(error: ErrorDetails): void {
    this.errorHistory.push(error);
    if (this.errorHistory.length > this.maxHistorySize) {
      this.errorHistory.shift();
    }
  }

  public subscribe(listener: (error: ErrorDetails) => void): () => void {
    this.errorListeners.add(listener);
    return () => {
      this.errorListeners.delete(listener);
    };
  }

  private notifyListeners(error: ErrorDetails): void {
    this.errorListeners.forEach((listener) => listener(error));
  }

  public getHistory(): ErrorDetails[] {
    return [...this.errorHistory];
  }

  public clearHistory(): void {
    this.errorHistory = [];
  }

  public updateOptions(options: Partial<ErrorHandlerOptions>): void {
    this.options = { ...this.options, ...options };
  }

  /**
   * Create a scoped error handler that tags every report with a scope name.
   */
  public createScoped(contextName: string): ScopedErrorHandler {
    return new ScopedErrorHandler(this, contextName);
  }
}

export class ScopedErrorHandler {
  constructor(
    private parent: ErrorHandler,
    private contextName: string
  ) {}

  handle(error: unknown, additionalContext?: Record<string, unknown>, customMessage?: string) {
    return this.parent.handle(
      error,
      {
        scope: this.contextName,
        ...additionalContext,
      },
      customMessage
    );
  }
}

export const errorHandler = new ErrorHandler();

export const subscribeToErrors = errorHandler.subscribe.bind(errorHandler);
