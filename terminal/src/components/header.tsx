/**
 * Header: top bar with the application name and the active view.
 */

import { Box, Text } from "ink";
import type { ViewName } from "../lib/keymap.js";
import { colors, symbols } from "../lib/theme.js";
import { useTerminal } from "../store/index.js";

const labels: Record<ViewName, string> = {
  menu: "Launcher",
  form: "Form",
};

export function Header() {
  const view = useTerminal((s) => s.body.kind);

  return (
    <Box paddingX={1} width="100%">
      <Text bold color={colors.brand}>
        WAYPOINT
      </Text>
      <Text color={colors.textDim}> {symbols.verticalLine} </Text>
      <Text color={colors.textBright}>{labels[view]}</Text>
    </Box>
  );
}
