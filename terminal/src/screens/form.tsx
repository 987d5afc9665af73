import { Box, Text } from "ink";
import { Panel } from "../components/panel.js";
import type { OutputEntry } from "../lib/form.js";
import { formKeys } from "../lib/keymap.js";
import { colors, symbols } from "../lib/theme.js";
import { shortTime } from "../lib/time.js";
import { useTerminal } from "../store/index.js";

export const FORM_INSTRUCTIONS = "Form - type text and press Enter to run. Esc to go back.";

function OutputRow({ entry }: { entry: OutputEntry }) {
  return (
    <Box flexDirection="column" marginBottom={1}>
      <Text color={colors.textDim}>[{shortTime(entry.at)}]</Text>
      <Text color={entry.failed ? colors.red : colors.text}>
        {entry.failed ? `${symbols.error} ` : ""}
        {entry.text}
      </Text>
    </Box>
  );
}

export function FormScreen() {
  const body = useTerminal((s) => s.body);

  if (body.kind !== "form") {
    return null;
  }
  const { inputBuffer, outputLog, pending } = body.form;
  const hint = formKeys.map((k) => `${k.label.toLowerCase()} ${k.description.toLowerCase()}`);

  return (
    <Box flexDirection="column" flexGrow={1} paddingX={1}>
      <Panel hint={hint.slice(1).join(" · ")} title="Form">
        <Text color={colors.textDim}>{FORM_INSTRUCTIONS}</Text>
        <Box marginY={1}>
          <Text color={colors.brand}>Input: </Text>
          <Text color={colors.textBright}>{inputBuffer}</Text>
          <Text color={colors.brand}>▏</Text>
        </Box>
        <Text bold color={colors.textBright}>
          Output:
        </Text>
        {outputLog.length === 0 && pending === 0 && (
          <Text color={colors.textMuted}>Nothing run yet.</Text>
        )}
        {outputLog.map((entry) => (
          <OutputRow entry={entry} key={entry.id} />
        ))}
        {pending > 0 && (
          <Text color={colors.yellow}>
            {symbols.pending} running {pending}…
          </Text>
        )}
      </Panel>
    </Box>
  );
}
