import express from "express";
import bodyParser from "body-parser";
import { createApi, errorHandler } from "./api.js";
import webRouterModule from "./web/webRouter.js";
import type { Commands } from "./commands.js";

export function createApp(commands: Commands): express.Express {
  const app = express();

  app.use(bodyParser.json());
  app.use(createApi(commands));
  app.use("/", webRouterModule.router);
  app.use(errorHandler);

  return app;
}
