/**
 * Panel: a bordered box with a title bar.
 *
 * The layout primitive both body views render into.
 */

import { Box, Text } from "ink";
import type React from "react";
import { colors } from "../lib/theme.js";

export type PanelProps = {
  title: string;
  hint?: string;
  children: React.ReactNode;
};

export function Panel({ title, hint, children }: PanelProps) {
  return (
    <Box
      borderColor={colors.borderFocus}
      borderStyle="round"
      flexDirection="column"
      flexGrow={1}
      paddingX={1}
    >
      <Box>
        <Text bold color={colors.brand}>
          {title}
        </Text>
        <Box flexGrow={1} />
        {hint && <Text color={colors.textMuted}>{hint}</Text>}
      </Box>
      <Box flexDirection="column" flexGrow={1}>
        {children}
      </Box>
    </Box>
  );
}
