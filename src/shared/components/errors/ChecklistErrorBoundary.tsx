/**
 * src/shared/components/errors/ChecklistErrorBoundary.tsx
 *
 * Error boundary for a checklist dropdown. Reports render failures (usually
 * a host accessor throwing on an item) and shows a fallback instead.
 */

import { Component, type ErrorInfo, type ReactNode } from 'react';
import { errorHandler } from '../../../utils/errorHandler';

interface Props {
  children: ReactNode;
  fallback?: ReactNode;
  /**
   * Values the failed render depended on, typically the items and config.
   * The boundary retries only when one of them changes. Without them it
   * retries whenever it receives a new child element.
   */
  resetKeys?: readonly unknown[];
}

interface State {
  hasError: boolean;
  error?: Error;
}

const scopedErrorHandler = errorHandler.createScoped('ChecklistDropdown');

function shouldReset(prevProps: Props, props: Props): boolean {
  const { resetKeys } = props;
  if (!resetKeys) {
    return prevProps.children !== props.children;
  }
  const prevKeys = prevProps.resetKeys ?? [];
  return (
    prevKeys.length !== resetKeys.length ||
    resetKeys.some((key, index) => !Object.is(key, prevKeys[index]))
  );
}

class ChecklistErrorBoundary extends Component<Props, State> {
  constructor(props: Props) {
    super(props);
    this.state = { hasError: false };
  }

  static getDerivedStateFromError(error: Error): State {
    return { hasError: true, error };
  }

  componentDidCatch(error: Error, errorInfo: ErrorInfo) {
    scopedErrorHandler.handle(error, {
      phase: 'render',
      componentStack: errorInfo.componentStack,
    });
  }

  componentDidUpdate(prevProps: Props) {
    if (this.state.hasError && shouldReset(prevProps, this.props)) {
      this.setState({ hasError: false, error: undefined });
    }
  }

  render() {
    if (this.state.hasError) {
      return (
        this.props.fallback ?? (
          <div className="checklist-dropdown checklist-dropdown-error" role="alert">
            Unable to display checklist
          </div>
        )
      );
    }

    return this.props.children;
  }
}

export default ChecklistErrorBoundary;
