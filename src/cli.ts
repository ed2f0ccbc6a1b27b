#!/usr/bin/env node
import { createInterface } from "readline/promises";
import { createCommands } from "./commands.js";
import { config } from "./config.js";
import { GoogleGeocoder } from "./geocoder.js";
import { runMenu } from "./menu.js";
import { createStore } from "./store.js";

const commands = createCommands({
  store: createStore(config),
  geocoder: new GoogleGeocoder({ apiKey: config.googleMapsApiKey, timeoutMs: config.geocoding.timeoutMs }),
  geocoding: config.geocoding,
});

const rl = createInterface({ input: process.stdin, output: process.stdout });

runMenu(commands, {
  ask: (question) => rl.question(question),
  say: (line) => console.log(line),
})
  .catch((err) => {
    console.error("Neighborhood checker failed:", err);
    process.exitCode = 1;
  })
  .finally(() => rl.close());
