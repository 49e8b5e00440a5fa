#!/usr/bin/env -S npx tsx
import React from "react";
import { render } from "ink";
import { CalculatorSession, loadSettings } from "tally-main";
import { App } from "./app/app.js";

const session = new CalculatorSession(loadSettings());
const { waitUntilExit } = render(<App session={session} />);

await waitUntilExit();
