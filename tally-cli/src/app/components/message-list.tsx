import React, { useEffect, useMemo, useRef, useState } from "react";
import { Box, Text, useInput } from "ink";
import { clamp, toDisplayLines } from "../transcript.js";
import type { TranscriptEntry } from "../types.js";

type Props = {
  readonly entries: TranscriptEntry[];
  readonly height: number;
  readonly width: number;
};

export function MessageList({ entries, height, width }: Props): React.JSX.Element {
  const [scrollTop, setScrollTop] = useState(0);

  const lines = useMemo(() => toDisplayLines(entries, width), [entries, width]);

  const viewportHeight = Math.max(1, height);
  const maxScrollTop = Math.max(0, lines.length - viewportHeight);
  const previousMaxRef = useRef(0);

  // Stick to the bottom unless the user scrolled up
  useEffect(() => {
    const wasAtBottom = scrollTop >= previousMaxRef.current;

    if (wasAtBottom) {
      if (scrollTop !== maxScrollTop) {
        setScrollTop(maxScrollTop);
      }
    } else if (scrollTop > maxScrollTop) {
      setScrollTop(maxScrollTop);
    }

    previousMaxRef.current = maxScrollTop;
  }, [maxScrollTop, scrollTop]);

  useInput((_, key) => {
    if (lines.length === 0) return;

    if (key.pageUp) {
      setScrollTop((value) => clamp(value - viewportHeight, 0, maxScrollTop));
    } else if (key.pageDown) {
      setScrollTop((value) => clamp(value + viewportHeight, 0, maxScrollTop));
    } else if (key.upArrow) {
      setScrollTop((value) => clamp(value - 1, 0, maxScrollTop));
    } else if (key.downArrow) {
      setScrollTop((value) => clamp(value + 1, 0, maxScrollTop));
    }
  });

  if (entries.length === 0) {
    return (
      <Box justifyContent="center" alignItems="center" height={viewportHeight}>
        <Text dimColor>Type an expression like 2*(3+4)^2 / 7, or help.</Text>
      </Box>
    );
  }

  const start = clamp(scrollTop, 0, maxScrollTop);
  const visibleLines = lines.slice(start, start + viewportHeight);

  return (
    <Box flexDirection="column" paddingX={1} height={viewportHeight}>
      {visibleLines.map((line, index) => (
        <Text key={`${start}-${index}`} color={line.color} bold={line.bold}>
          {line.text.length > 0 ? line.text : " "}
        </Text>
      ))}
    </Box>
  );
}
