/**
 * StatusBar: bottom bar rendering the status surface text.
 */

import { Box, Text } from "ink";
import { colors, symbols } from "../lib/theme.js";
import { useTerminal } from "../store/index.js";

export function StatusBar() {
  const statusText = useTerminal((s) => s.statusText);
  const armed = useTerminal((s) => s.chord.armed);
  const view = useTerminal((s) => s.body.kind);

  return (
    <Box paddingX={1} width="100%">
      <Text color={armed ? colors.yellow : colors.textMuted}>
        {armed ? symbols.armed : symbols.idle}{" "}
      </Text>
      <Text color={armed ? colors.yellow : colors.textDim}>{statusText}</Text>
      <Box flexGrow={1} />
      <Text color={colors.textMuted}>[{view.toUpperCase()}]</Text>
    </Box>
  );
}
