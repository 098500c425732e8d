#!/usr/bin/env node
import { render } from "ink";
import React from "react";
import App from "./App.js";
import { createClientConfig } from "./app/config.js";
import { SessionRunner } from "./app/state/sessionRunner.js";

async function main(): Promise<void> {
  const config = createClientConfig(process.argv.slice(2));
  let exitApp: () => void = () => undefined;
  const runner = new SessionRunner({
    serverUrl: config.serverUrl,
    onQuit: () => exitApp()
  });

  console.clear();
  const app = render(
    <React.StrictMode>
      <App runner={runner} config={config} />
    </React.StrictMode>,
    { exitOnCtrlC: false }
  );
  exitApp = () => app.unmount();

  runner.start();
  await app.waitUntilExit();
}

main().then(
  () => process.exit(0),
  (error: unknown) => {
    console.error("[session] Error running program:", error);
    process.exit(1);
  }
);
