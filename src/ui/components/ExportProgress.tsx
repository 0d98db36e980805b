import React from 'react';
import { Box, Text } from 'ink';
import type { CloneError } from '../../lib/errors';
import type { ExportEvent, ExportSummary } from '../../services/exporter';
import { pluralize, truncate } from '../../lib/utils';
import { MAX_LABEL_WIDTH } from '../../config/constants';

export interface ProgressState {
  organization: string;
  total: number | null;
  current: { name: string; index: number } | null;
  succeeded: number;
  failures: CloneError[];
}

export function initialProgress(organization: string): ProgressState {
  return { organization, total: null, current: null, succeeded: 0, failures: [] };
}

/**
 * Folds one exporter event into the progress shown on screen
 */
export function reduceProgress(state: ProgressState, event: ExportEvent): ProgressState {
  switch (event.type) {
    case 'listing':
      return { ...state, organization: event.organization };
    case 'listed':
      return { ...state, total: event.total };
    case 'clone_started':
      return { ...state, current: { name: event.repository.name, index: event.index } };
    case 'clone_finished':
      return event.result.ok
        ? { ...state, succeeded: state.succeeded + 1 }
        : { ...state, failures: [...state.failures, event.result.error] };
  }
}

function FailureList({ failures }: { failures: CloneError[] }) {
  if (failures.length === 0) return null;
  return (
    <Box flexDirection="column" marginTop={1}>
      {failures.map(failure => (
        <Text key={failure.repository.name} color="yellow">
          ✗ {truncate(failure.message, MAX_LABEL_WIDTH)}
        </Text>
      ))}
    </Box>
  );
}

export function ExportProgress({ progress }: { progress: ProgressState }) {
  if (progress.total === null) {
    return <Text color="yellow">Fetching repositories for {progress.organization}...</Text>;
  }

  return (
    <Box flexDirection="column">
      <Text>
        Found {pluralize(progress.total, 'repository', 'repositories')} in {progress.organization}
      </Text>
      {progress.current && (
        <Text color="cyan">
          Cloning {progress.current.index + 1}/{progress.total}: {progress.current.name}
        </Text>
      )}
      <FailureList failures={progress.failures} />
    </Box>
  );
}

export function ExportSummaryView({ summary }: { summary: ExportSummary }) {
  const failed = summary.failures.length;
  return (
    <Box flexDirection="column">
      <Text bold color={failed === 0 ? 'green' : 'yellow'}>
        Cloned {summary.succeeded} of {pluralize(summary.total, 'repository', 'repositories')} from {summary.organization}
      </Text>
      <Text color="gray">Into {summary.targetDir}</Text>
      {failed > 0 && <Text color="yellow">{pluralize(failed, 'clone')} failed:</Text>}
      <FailureList failures={summary.failures} />
    </Box>
  );
}
