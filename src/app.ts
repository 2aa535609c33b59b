// src/app.ts
import express, { type Express } from "express";
import cors from "cors";
import bodyParser from "body-parser";
import type { AppServices } from "./services";
import { createUserRouter } from "./userRoute";
import { createAdminRouter } from "./adminRoute";
import { errorHandler, sendError } from "./http";

export function createApp(services: AppServices): Express {
  const app = express();
  app.use(cors());
  app.use(bodyParser.json({ limit: "1mb" }));

  app.use(createUserRouter(services));
  app.use("/v1/admin", createAdminRouter(services));

  app.use((req, res) => sendError(res, 404, `not_found: ${req.method} ${req.path}`));
  app.use(errorHandler);
  return app;
}
