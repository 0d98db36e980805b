import React, { useState } from 'react';
import { Box, Text, useInput } from 'ink';
import TextInput from 'ink-text-input';
import chalk from 'chalk';
import type { Displayable } from '../../types';
import { truncate } from '../../lib/utils';
import { MAX_LABEL_WIDTH } from '../../config/constants';

export type MenuChoice =
  | { ok: true; index: number }
  | { ok: false; message: string };

const INTEGER_PATTERN = /^[+-]?\d+$/;

/**
 * Validates one line typed at the menu prompt
 *
 * @param input - Raw text as entered
 * @param count - Number of items in the menu
 * @returns The zero-based index, or the message to show before prompting again
 */
export function parseMenuChoice(input: string, count: number): MenuChoice {
  const trimmed = input.trim();
  if (!INTEGER_PATTERN.test(trimmed)) {
    return { ok: false, message: 'Please enter a number' };
  }
  const value = Number.parseInt(trimmed, 10);
  if (value < 1 || value > count) {
    return { ok: false, message: `Enter a number between 1 and ${count}` };
  }
  return { ok: true, index: value - 1 };
}

interface SelectionMenuProps<T extends Displayable> {
  title: string;
  items: readonly T[];
  onSelect: (index: number) => void;
  /** Esc, Ctrl+C or Ctrl+D */
  onCancel: () => void;
}

export function SelectionMenu<T extends Displayable>({ title, items, onSelect, onCancel }: SelectionMenuProps<T>) {
  const [input, setInput] = useState('');
  const [error, setError] = useState<string | null>(null);

  useInput((ch, key) => {
    if (key.escape || (key.ctrl && (ch === 'c' || ch === 'd'))) {
      onCancel();
    }
  });

  const handleSubmit = (value: string) => {
    const choice = parseMenuChoice(value, items.length);
    setInput('');
    if (choice.ok) {
      setError(null);
      onSelect(choice.index);
    } else {
      setError(choice.message);
    }
  };

  return (
    <Box flexDirection="column">
      <Text bold>{title}</Text>
      <Box flexDirection="column" marginY={1}>
        {items.map((item, i) => (
          <Text key={`${i}-${item.displayLabel()}`}>
            {chalk.cyan(`${i + 1}.`)} {truncate(item.displayLabel(), MAX_LABEL_WIDTH)}
          </Text>
        ))}
      </Box>
      <Box>
        <Text>{'Choice -> '}</Text>
        <TextInput value={input} onChange={setInput} onSubmit={handleSubmit} />
      </Box>
      {error && <Text color="red">{error}</Text>}
      <Text color="gray" dimColor>Enter a number and press Enter • Esc to cancel</Text>
    </Box>
  );
}

export default SelectionMenu;
