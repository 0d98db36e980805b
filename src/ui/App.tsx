import React, { useCallback, useEffect, useState } from 'react';
import { Box, Text, useApp } from 'ink';
import type { ExporterSettings } from '../config/config';
import { isDebugEnv } from '../config/config';
import { FetchError, describeError } from '../lib/errors';
import { logger } from '../lib/logger';
import { makeClient, listOrganizations } from '../services/github';
import type { GithubClient } from '../services/github';
import type { Cloner } from '../services/git/cloner';
import { exportOrganization } from '../services/exporter';
import type { ExportSummary } from '../services/exporter';
import { describeDirectoryProblem, prepareTargetDirectory } from '../services/exportDirectory';
import type { PrepareDirectoryResult } from '../services/exportDirectory';
import type { Credential, Organization } from '../types';
import { CredentialsPrompt } from './components/CredentialsPrompt';
import { SelectionMenu } from './components/SelectionMenu';
import { DirectoryPrompt } from './components/DirectoryPrompt';
import { ExportProgress, ExportSummaryView, initialProgress, reduceProgress } from './components/ExportProgress';
import type { ProgressState } from './components/ExportProgress';
import { ErrorBoundary } from './components/ErrorBoundary';

/**
 * Discriminated union of every screen in the export flow. Each variant
 * carries only what that step needs.
 */
type AppState =
  | { mode: 'credentials'; error?: string }
  | { mode: 'loading_orgs'; credential: Credential }
  | { mode: 'select_org'; client: GithubClient; organizations: Organization[] }
  | { mode: 'directory'; client: GithubClient; organization: Organization; error?: string }
  | { mode: 'exporting'; client: GithubClient; organization: Organization; targetDir: string; progress: ProgressState }
  | { mode: 'done'; summary: ExportSummary }
  | { mode: 'finished'; message: string }
  | { mode: 'error'; error: string };

interface AppProps {
  settings: ExporterSettings;
  cloner: Cloner;
  version: string;
}

export default function App({ settings, cloner, version }: AppProps) {
  const { exit } = useApp();
  const [appState, setAppState] = useState<AppState>({ mode: 'credentials' });

  const fail = useCallback((error: unknown) => {
    logger.error('Export aborted', { error });
    setAppState({ mode: 'error', error: describeError(error) });
  }, []);

  const finish = useCallback((message: string) => {
    logger.info('Exiting without export', { reason: message });
    setAppState({ mode: 'finished', message });
  }, []);

  // Organizations for the entered credential
  useEffect(() => {
    if (appState.mode !== 'loading_orgs') return;

    let active = true;
    const client = makeClient(appState.credential, { baseUrl: settings.apiBaseUrl });
    listOrganizations(client, { maxPages: settings.maxPages }).then(
      organizations => {
        if (!active) return;
        if (organizations.length === 0) {
          finish('No organizations found for this account.');
        } else {
          setAppState({ mode: 'select_org', client, organizations });
        }
      },
      (error: unknown) => {
        if (!active) return;
        if (error instanceof FetchError && error.status === 401) {
          setAppState({ mode: 'credentials', error: 'Bad credentials. Check your username and token.' });
        } else {
          fail(error);
        }
      }
    );

    return () => {
      active = false;
    };
  }, [appState.mode]);

  // List and clone
  useEffect(() => {
    if (appState.mode !== 'exporting') return;

    const { client, organization, targetDir } = appState;
    exportOrganization(client, organization, targetDir, {
      cloner,
      perPage: settings.perPage,
      protocol: settings.cloneProtocol,
      maxPages: settings.maxPages,
      onEvent: event =>
        setAppState(prev => (prev.mode === 'exporting' ? { ...prev, progress: reduceProgress(prev.progress, event) } : prev)),
    }).then(summary => setAppState({ mode: 'done', summary }), fail);
  }, [appState.mode]);

  // Leave once a terminal state has rendered
  useEffect(() => {
    if (appState.mode === 'done' || appState.mode === 'finished') {
      exit();
    } else if (appState.mode === 'error') {
      exit(new Error(appState.error));
    }
  }, [appState.mode]);

  const submitCredential = useCallback((credential: Credential) => {
    logger.info('Credentials entered', { user: credential.identity });
    setAppState({ mode: 'loading_orgs', credential });
  }, []);

  const selectOrganization = (index: number) => {
    if (appState.mode !== 'select_org') return;
    const organization = appState.organizations[index];
    logger.info('Organization selected', { organization: organization.login });
    setAppState({ mode: 'directory', client: appState.client, organization });
  };

  const submitDirectory = (input: string) => {
    if (appState.mode !== 'directory') return;

    let result: PrepareDirectoryResult;
    try {
      result = prepareTargetDirectory(input);
    } catch (error) {
      logger.warn('Could not prepare export directory', { input, error });
      setAppState({ ...appState, error: `Could not use ${input}: ${describeError(error)}` });
      return;
    }

    if (!result.ok) {
      setAppState({ ...appState, error: describeDirectoryProblem(result) });
      return;
    }

    setAppState({
      mode: 'exporting',
      client: appState.client,
      organization: appState.organization,
      targetDir: result.path,
      progress: initialProgress(appState.organization.login),
    });
  };

  const header = (
    <Box flexDirection="row" gap={1} marginBottom={1}>
      <Text bold color="cyan">GitHub Organization Exporter</Text>
      <Text color="gray" dimColor>v{version}</Text>
      {isDebugEnv() && <Text backgroundColor="blue" color="white"> debug mode </Text>}
    </Box>
  );

  let body: React.ReactNode = null;
  switch (appState.mode) {
    case 'credentials':
      body = (
        <CredentialsPrompt
          onSubmit={submitCredential}
          onCancel={() => finish('Cancelled.')}
          error={appState.error}
        />
      );
      break;
    case 'loading_orgs':
      body = <Text color="yellow">Fetching organizations...</Text>;
      break;
    case 'select_org':
      body = (
        <SelectionMenu
          title="Choose a GitHub organization"
          items={appState.organizations}
          onSelect={selectOrganization}
          onCancel={() => finish('No organization selected. Nothing was exported.')}
        />
      );
      break;
    case 'directory':
      body = (
        <DirectoryPrompt
          organization={appState.organization.login}
          onSubmit={submitDirectory}
          onCancel={() => finish('Cancelled. Nothing was exported.')}
          error={appState.error}
        />
      );
      break;
    case 'exporting':
      body = <ExportProgress progress={appState.progress} />;
      break;
    case 'done':
      body = <ExportSummaryView summary={appState.summary} />;
      break;
    case 'finished':
      body = <Text>{appState.message}</Text>;
      break;
    case 'error':
      body = <Text color="red">{appState.error}</Text>;
      break;
  }

  return (
    <Box flexDirection="column" paddingX={2}>
      {header}
      <ErrorBoundary onCrash={fail}>{body}</ErrorBoundary>
    </Box>
  );
}
