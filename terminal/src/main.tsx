#!/usr/bin/env node

/**
 * Waypoint terminal launcher
 *
 * Usage:
 *   waypoint                         Launch the launcher menu
 *   waypoint --config=PATH           Read settings from a TOML file
 *   waypoint --log-file=PATH         Write diagnostic events to PATH
 *   waypoint --no-log                Disable the diagnostic event log
 *   waypoint --chord-timeout=SECS    Seconds a chord prefix stays armed
 *   waypoint --help                  Show help
 */

import { render } from "ink";
import { interruptedError, loadConfig, toLookupError } from "../../sdk/typescript/src/index.js";
import { App } from "./app.js";
import { type EventSink, FileEventLog, silentEventLog } from "./lib/event-log.js";
import { createChordBindings } from "./lib/keymap.js";
import { paths } from "./lib/paths.js";
import { CancellableTimer } from "./lib/timer.js";
import { TerminalProvider, createTerminalStore } from "./store/index.js";

// ── CLI argument parsing ────────────────────────────────────────

const args = process.argv.slice(2);

if (args.includes("--help") || args.includes("-h")) {
  console.log(`
Waypoint terminal launcher

Usage:
  waypoint                         Launch the launcher menu
  waypoint --config=PATH           Settings file (default ${paths.configFile})
  waypoint --log-file=PATH         Diagnostic event log (default logs/tui_events.log)
  waypoint --no-log                Disable the diagnostic event log
  waypoint --chord-timeout=SECS    Seconds a chord prefix stays armed

Keyboard:
  f          Open the form (from the launcher)
  Ctrl+X q   Quit
  Esc        Leave the form
  Ctrl+C     Cancel and exit
`);
  process.exit(0);
}

function readFlag(name: string): string | null {
  const prefix = `--${name}=`;
  const arg = args.find((a) => a.startsWith(prefix));
  return arg ? arg.slice(prefix.length) : null;
}

function parseSeconds(raw: string | null, fallback: number): number {
  if (raw === null) {
    return fallback;
  }
  const value = Number.parseFloat(raw);
  return Number.isFinite(value) && value > 0 ? value : fallback;
}

// ── Render ──────────────────────────────────────────────────────

async function main(): Promise<number> {
  const config = await loadConfig(readFlag("config") ?? undefined);
  const bindings = createChordBindings({
    prefix: config.chord.prefix,
    quitKey: config.chord.quit_key,
    timeoutMs: parseSeconds(readFlag("chord-timeout"), config.chord.timeout_seconds) * 1000,
  });

  const logEnabled = config.logging.enabled && !args.includes("--no-log");
  const logFile = paths.resolveLogFile(readFlag("log-file") ?? config.logging.event_log);
  const eventLog: EventSink = logEnabled ? new FileEventLog(logFile) : silentEventLog;
  const timer = new CancellableTimer();

  let interrupted = false;
  const store = createTerminalStore({
    bindings,
    eventLog,
    timer,
    onQuit: () => instance.unmount(),
    onInterrupt: () => {
      interrupted = true;
      instance.unmount();
    },
  });

  const instance = render(
    <TerminalProvider store={store}>
      <App />
    </TerminalProvider>,
    { exitOnCtrlC: false }
  );
  eventLog.write(logEnabled ? `Launcher started, logging to ${logFile}` : "Launcher started");

  const onSignal = () => {
    interrupted = true;
    instance.unmount();
  };
  process.once("SIGINT", onSignal);
  process.once("SIGTERM", onSignal);

  try {
    await instance.waitUntilExit();
  } finally {
    timer.cancel();
    process.off("SIGINT", onSignal);
    process.off("SIGTERM", onSignal);
    if (eventLog instanceof FileEventLog) {
      await eventLog.flush();
    }
  }

  if (interrupted) {
    const err = interruptedError();
    console.error(`\n${err.message}`);
    return err.exitCode;
  }
  return 0;
}

try {
  process.exitCode = await main();
} catch (err) {
  const failure = toLookupError(err);
  console.error(`Error: ${failure.message}`);
  process.exitCode = failure.exitCode;
}
