/**
 * Root application component.
 *
 * Header and status bar stay mounted; the body slot in between shows either
 * the launcher menu or the form, never both.
 */

import { Box } from "ink";
import { Header } from "./components/header.js";
import { StatusBar } from "./components/status-bar.js";
import { useKeybinds } from "./hooks/use-keybinds.js";
import { FormScreen } from "./screens/form.js";
import { MenuScreen } from "./screens/menu.js";
import { useTerminal } from "./store/index.js";

const bodyViews = {
  menu: MenuScreen,
  form: FormScreen,
} as const;

export function App() {
  const view = useTerminal((s) => s.body.kind);

  useKeybinds();

  const BodyView = bodyViews[view];

  return (
    <Box flexDirection="column" height="100%" width="100%">
      <Header />
      <Box flexGrow={1}>
        <BodyView />
      </Box>
      <StatusBar />
    </Box>
  );
}
