import React, { useState } from 'react';
import { Box, Text, useInput } from 'ink';
import TextInput from 'ink-text-input';
import type { Credential } from '../../types';
import { TOKEN_SETTINGS_URL } from '../../config/constants';

interface CredentialsPromptProps {
  onSubmit: (credential: Credential) => void;
  onCancel: () => void;
  error?: string;
}

type Step = 'identity' | 'secret';

/**
 * Asks for the GitHub username, then the personal access token (masked)
 */
export function CredentialsPrompt({ onSubmit, onCancel, error }: CredentialsPromptProps) {
  const [step, setStep] = useState<Step>('identity');
  const [identity, setIdentity] = useState('');
  const [secret, setSecret] = useState('');
  const [inputError, setInputError] = useState<string | null>(null);

  useInput((ch, key) => {
    if (key.escape || (key.ctrl && (ch === 'c' || ch === 'd'))) {
      onCancel();
    }
  });

  const submitIdentity = (value: string) => {
    if (!value.trim()) {
      setInputError('Username cannot be empty');
      return;
    }
    setInputError(null);
    setStep('secret');
  };

  const submitSecret = (value: string) => {
    if (!value.trim()) {
      setInputError('Token cannot be empty');
      return;
    }
    setInputError(null);
    onSubmit({ identity: identity.trim(), secret: value.trim() });
  };

  return (
    <Box borderStyle="single" borderColor="cyan" paddingX={2} paddingY={1} flexDirection="column">
      <Text bold>Authentication Required</Text>
      <Text color="gray">Generate a personal access token at {TOKEN_SETTINGS_URL}</Text>
      <Box marginTop={1}>
        <Text>{'GitHub username: '}</Text>
        {step === 'identity' ? (
          <TextInput value={identity} onChange={setIdentity} onSubmit={submitIdentity} />
        ) : (
          <Text>{identity}</Text>
        )}
      </Box>
      {step === 'secret' && (
        <Box>
          <Text>{'Personal access token: '}</Text>
          <TextInput value={secret} onChange={setSecret} onSubmit={submitSecret} mask="*" />
        </Box>
      )}
      {(inputError ?? error) && (
        <Text color="red">{inputError ?? error}</Text>
      )}
      <Text color="gray" dimColor>
        The token is only kept in memory for this run • Esc to quit
      </Text>
    </Box>
  );
}

export default CredentialsPrompt;
