import React from 'react';
import { Box, Text } from 'ink';
import { logger, getLogPath } from '../../lib/logger';

interface ErrorBoundaryProps {
  children: React.ReactNode;
  /** Called once the boundary has caught a render error */
  onCrash?: (error: Error) => void;
}

interface ErrorBoundaryState {
  error: Error | null;
}

export class ErrorBoundary extends React.Component<ErrorBoundaryProps, ErrorBoundaryState> {
  constructor(props: ErrorBoundaryProps) {
    super(props);
    this.state = { error: null };
  }

  static getDerivedStateFromError(error: Error): ErrorBoundaryState {
    return { error };
  }

  componentDidCatch(error: Error, errorInfo: React.ErrorInfo): void {
    logger.error('UI render failed', {
      error: error.message,
      stack: error.stack,
      componentStack: errorInfo.componentStack,
    });
    this.props.onCrash?.(error);
  }

  render(): React.ReactNode {
    if (this.state.error) {
      return (
        <Box flexDirection="column" padding={1}>
          <Text color="red" bold>Export interrupted by an unexpected error</Text>
          <Text color="gray">{this.state.error.message || 'Unknown error'}</Text>
          <Text color="gray" dimColor>Details were written to {getLogPath()}</Text>
        </Box>
      );
    }

    return this.props.children;
  }
}
