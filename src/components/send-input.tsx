/**
 * SendInput: single-line prompt for records to send.
 *
 * Props are mirrored into refs so the `useInput` handler keeps one identity
 * for the life of the component; Ink re-subscribes stdin whenever that
 * handler changes, and keystrokes arriving mid-resubscribe are lost while
 * records stream in.
 */

import React, { useCallback, useRef, useState, type FC } from "react";
import { Box, Text, useInput, type Key } from "ink";
import chalk from "chalk";
import { colors } from "../lib/palette.js";

export interface SendInputProps {
  /** Shown before the cursor, usually the bound peer. */
  label: string;
  /** Called with the trimmed line on enter. Empty lines are ignored. */
  onSubmit: (line: string) => void;
  focus?: boolean;
  placeholder?: string;
}

export const SendInput: FC<SendInputProps> = ({
  label,
  onSubmit,
  focus = true,
  placeholder = "",
}) => {
  const [value, setValue] = useState("");
  const [cursor, setCursor] = useState(0);

  const valueRef = useRef(value);
  const cursorRef = useRef(cursor);
  const onSubmitRef = useRef(onSubmit);
  valueRef.current = value;
  cursorRef.current = cursor;
  onSubmitRef.current = onSubmit;

  const commit = (next: string, offset: number) => {
    const clamped = Math.max(0, Math.min(offset, next.length));
    valueRef.current = next;
    cursorRef.current = clamped;
    setValue(next);
    setCursor(clamped);
  };

  const handleInput = useCallback((input: string, key: Key) => {
    // Ctrl chords belong to the app-level hotkeys.
    if (key.ctrl || key.tab || key.upArrow || key.downArrow) return;

    const current = valueRef.current;
    const offset = cursorRef.current;

    if (key.return) {
      const line = current.trim();
      if (!line) return;
      commit("", 0);
      onSubmitRef.current(line);
      return;
    }

    if (key.leftArrow) {
      commit(current, offset - 1);
    } else if (key.rightArrow) {
      commit(current, offset + 1);
    } else if (key.backspace || key.delete) {
      if (offset > 0) commit(current.slice(0, offset - 1) + current.slice(offset), offset - 1);
    } else if (input) {
      commit(current.slice(0, offset) + input + current.slice(offset), offset + input.length);
    }
  }, []);

  useInput(handleInput, { isActive: focus });

  return (
    <Box paddingX={1}>
      <Text color={colors.accent} bold>
        {label} ❯{" "}
      </Text>
      <Text>{renderValue(value, cursor, focus, placeholder)}</Text>
    </Box>
  );
};

function renderValue(value: string, cursor: number, focus: boolean, placeholder: string): string {
  if (!value) {
    if (!focus) return chalk.dim(placeholder);
    return chalk.inverse(placeholder[0] ?? " ") + chalk.dim(placeholder.slice(1));
  }
  if (!focus) return value;

  let rendered = "";
  let index = 0;
  for (const char of value) {
    rendered += index === cursor ? chalk.inverse(char) : char;
    index++;
  }
  if (cursor === value.length) rendered += chalk.inverse(" ");
  return rendered;
}
