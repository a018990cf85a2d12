import React, { useState, useCallback, useEffect } from "react";
import { Box, useApp, useInput } from "ink";
import { handleLine, type SessionState } from "tally-main";
import { Header } from "./components/header.js";
import { MessageList } from "./components/message-list.js";
import { CalcInput } from "./components/calc-input.js";
import { StatusBar } from "./components/status-bar.js";
import { entriesForReply } from "./transcript.js";
import type { TranscriptEntry } from "./types.js";

const HEADER_HEIGHT = 3;
const STATUS_HEIGHT = 1;
const INPUT_HEIGHT = 3;
const RESERVED_ROWS = HEADER_HEIGHT + STATUS_HEIGHT + INPUT_HEIGHT;
const MIN_TERMINAL_ROWS = 10;
const MIN_MESSAGE_ROWS = 3;
const MIN_TERMINAL_COLUMNS = 20;

type Props = {
  readonly state: SessionState;
  readonly onInterrupt: () => void;
};

export function App({ state, onInterrupt }: Props): React.JSX.Element {
  const { exit } = useApp();
  const [entries, setEntries] = useState<TranscriptEntry[]>([]);
  const [inputValue, setInputValue] = useState("");
  const [terminalRows, setTerminalRows] = useState(
    Math.max(process.stdout.rows ?? 24, MIN_TERMINAL_ROWS),
  );
  const [terminalColumns, setTerminalColumns] = useState(
    Math.max(process.stdout.columns ?? 80, MIN_TERMINAL_COLUMNS),
  );

  useEffect(() => {
    const handleResize = (): void => {
      setTerminalRows(Math.max(process.stdout.rows ?? 24, MIN_TERMINAL_ROWS));
      setTerminalColumns(
        Math.max(process.stdout.columns ?? 80, MIN_TERMINAL_COLUMNS),
      );
    };

    process.stdout.on("resize", handleResize);

    return () => {
      process.stdout.off("resize", handleResize);
    };
  }, []);

  useInput((input, key) => {
    if (key.ctrl && input === "c") {
      onInterrupt();
      exit();
    }
  });

  const handleSubmit = useCallback(
    (value: string) => {
      const trimmed = value.trim();
      setInputValue("");
      if (!trimmed) return;

      const reply = handleLine(trimmed, state);
      const added = entriesForReply(trimmed, reply);

      if (reply.kind === "clear") {
        setEntries(added);
        return;
      }

      setEntries((prev) => [...prev, ...added]);

      if (reply.kind === "exit") {
        exit();
      }
    },
    [exit, state],
  );

  const messageViewportHeight = Math.max(
    MIN_MESSAGE_ROWS,
    terminalRows - RESERVED_ROWS,
  );

  return (
    <Box flexDirection="column" height={terminalRows}>
      <Header />
      <MessageList
        entries={entries}
        height={messageViewportHeight}
        width={terminalColumns - 2}
      />
      <StatusBar
        angleMode={state.angleMode}
        precision={state.precision}
        memory={state.memory}
        historySize={state.history.size}
      />
      <CalcInput
        value={inputValue}
        onChange={setInputValue}
        onSubmit={handleSubmit}
      />
    </Box>
  );
}
