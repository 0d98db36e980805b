import React from 'react';
import { describe, it, expect, vi } from 'vitest';
import { render } from 'ink-testing-library';
import { Text } from 'ink';
import { ErrorBoundary } from '../../src/ui/components/ErrorBoundary';

vi.mock('../../src/lib/logger', () => ({
  logger: {
    debug: vi.fn(),
    error: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
  },
  getLogPath: () => '/mock/log/path/exporter.log',
}));

// Component that throws an error
const ThrowError = ({ shouldThrow }: { shouldThrow: boolean }) => {
  if (shouldThrow) {
    throw new Error('Test error message');
  }
  return <Text>No error</Text>;
};

describe('ErrorBoundary', () => {
  it('should render children when no error occurs', () => {
    const { lastFrame } = render(
      <ErrorBoundary>
        <ThrowError shouldThrow={false} />
      </ErrorBoundary>
    );

    expect(lastFrame()).toContain('No error');
  });

  it('should render the crash screen and report the error', () => {
    // Suppress React's own error output for this test
    const consoleError = vi.spyOn(console, 'error').mockImplementation(() => {});
    const onCrash = vi.fn();

    const { lastFrame } = render(
      <ErrorBoundary onCrash={onCrash}>
        <ThrowError shouldThrow={true} />
      </ErrorBoundary>
    );

    const output = lastFrame();
    expect(output).toContain('Export interrupted by an unexpected error');
    expect(output).toContain('Test error message');
    expect(output).toContain('Details were written to /mock/log/path/exporter.log');
    expect(onCrash).toHaveBeenCalledWith(expect.objectContaining({ message: 'Test error message' }));

    consoleError.mockRestore();
  });
});
