import { Box, Text } from "ink";
import { Panel } from "../components/panel.js";
import { type ChordBindings, globalKeys, launcherEntries } from "../lib/keymap.js";
import { colors, symbols } from "../lib/theme.js";
import { useTerminal } from "../store/index.js";

const BOX_WIDTH = 40;
const RULE = symbols.horizontalLine.repeat(42);

function centered(text: string, width: number): string {
  const left = Math.floor((width - text.length) / 2);
  return " ".repeat(Math.max(0, left)) + text.padEnd(width - Math.max(0, left));
}

/** Launcher menu as plain lines, built from the keymap. */
export function menuLines(bindings: ChordBindings): string[] {
  const lines = [
    `╔${"═".repeat(BOX_WIDTH)}╗`,
    `║${centered("Waypoint Launcher", BOX_WIDTH)}║`,
    `╚${"═".repeat(BOX_WIDTH)}╝`,
    "",
    "Available Screens:",
    RULE,
  ];
  for (const entry of launcherEntries) {
    lines.push(`  [${entry.key}]  ${entry.name.padEnd(20)} ${entry.description}`);
  }
  lines.push("", "Global Shortcuts:", RULE);
  for (const binding of globalKeys(bindings)) {
    lines.push(`  [${binding.label}]  ${binding.description}`);
  }
  lines.push("", "Tip: Press a key above to launch that screen.");
  return lines;
}

export function MenuScreen() {
  const bindings = useTerminal((s) => s.bindings);

  return (
    <Box flexDirection="column" flexGrow={1} paddingX={1}>
      <Panel title="Launcher">
        {menuLines(bindings).map((line, i) => (
          <Text color={i < 3 ? colors.brand : colors.text} key={`${i}:${line}`}>
            {line.length > 0 ? line : " "}
          </Text>
        ))}
      </Panel>
    </Box>
  );
}
