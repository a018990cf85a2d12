import React from "react";
import { Box, Text } from "ink";

export function Header(): React.JSX.Element {
  return (
    <Box
      borderStyle="single"
      borderColor="cyan"
      paddingX={1}
      justifyContent="center"
    >
      <Text bold color="cyan">
        Tally
      </Text>
      <Text dimColor> calculator v1.0.0</Text>
    </Box>
  );
}
