import React, { useState } from 'react';
import { Box, Text, useInput } from 'ink';
import TextInput from 'ink-text-input';

interface DirectoryPromptProps {
  organization: string;
  onSubmit: (input: string) => void;
  onCancel: () => void;
  error?: string;
}

export function DirectoryPrompt({ organization, onSubmit, onCancel, error }: DirectoryPromptProps) {
  const [value, setValue] = useState('');

  useInput((ch, key) => {
    if (key.escape || (key.ctrl && (ch === 'c' || ch === 'd'))) {
      onCancel();
    }
  });

  const handleSubmit = (input: string) => {
    setValue('');
    onSubmit(input);
  };

  return (
    <Box flexDirection="column">
      <Text bold>Export {organization}</Text>
      <Box marginTop={1}>
        <Text>{'Directory to export to: '}</Text>
        <TextInput
          value={value}
          onChange={setValue}
          onSubmit={handleSubmit}
          placeholder="./backup"
        />
      </Box>
      {error && <Text color="red">{error}</Text>}
      <Text color="gray" dimColor>The directory is created if missing and must be empty • Esc to cancel</Text>
    </Box>
  );
}

export default DirectoryPrompt;
