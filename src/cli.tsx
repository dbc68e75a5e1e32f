#!/usr/bin/env node
import React from "react";
import { render } from "ink";
import { App } from "./App.js";
import { buildProgram, type InteractiveRun } from "./commands.js";
import { logError } from "./lib/log.js";

const program = buildProgram({
  renderInteractive: process.stdout.isTTY
    ? async (desired, options, verbose) => {
        let run: InteractiveRun = { result: null, error: null };
        const instance = render(
          <App
            desired={desired}
            options={options}
            verbose={verbose}
            onDone={(result, error) => {
              run = { result, error };
            }}
          />,
          { exitOnCtrlC: false },
        );
        await instance.waitUntilExit();
        return run;
      }
    : undefined,
});

program.parseAsync(process.argv).catch((error: unknown) => {
  logError("converge", error);
  process.exitCode = 1;
});
