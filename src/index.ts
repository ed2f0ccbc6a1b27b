import { createServer } from "http";
import { createApp } from "./app.js";
import { createCommands } from "./commands.js";
import { config } from "./config.js";
import { GoogleGeocoder } from "./geocoder.js";
import { createStore } from "./store.js";

const commands = createCommands({
  store: createStore(config),
  geocoder: new GoogleGeocoder({ apiKey: config.googleMapsApiKey, timeoutMs: config.geocoding.timeoutMs }),
  geocoding: config.geocoding,
});

if (!config.googleMapsApiKey) {
  console.warn("GOOGLE_MAPS_API_KEY is not set - address checks will fail until it is configured");
}

const server = createServer(createApp(commands));

server.listen(config.port, () =>
  console.log(`Server listening on :${config.port} - API docs at http://localhost:${config.port}/docs`)
);
