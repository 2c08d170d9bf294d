/**
 * @file app.ts
 * @description Express application assembly
 */

import express from "express";
import cors from "cors";
import { Logger } from "./utils/logger";
import { CoverController } from "./controllers/coverController";
import { createCoverRouter } from "./routes/coverRoutes";
import { ErrorHandler } from "./core/errorHandler";

/**
 * @function createApp
 * @description Builds the HTTP app around a controller
 */
export function createApp(controller: CoverController): express.Express {
  const app = express();

  // Middleware
  app.use(cors());
  app.use(express.json({ limit: "1mb" }));

  // Routes
  app.use("/", createCoverRouter(controller));

  // Error handling middleware
  app.use(
    (
      err: Error,
      req: express.Request,
      res: express.Response,
      next: express.NextFunction
    ) => {
      Logger.error("Unhandled error:", err);
      if (res.headersSent) {
        next(err);
        return;
      }
      if (err instanceof SyntaxError) {
        res.status(400).json({ error: "Malformed JSON body" });
        return;
      }
      ErrorHandler.handleHttpError(err, res);
    }
  );

  return app;
}
