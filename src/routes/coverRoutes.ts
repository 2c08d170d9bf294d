/**
 * @file coverRoutes.ts
 * @description Express routes for the cover wizard
 */

import express from "express";
import { CoverController } from "../controllers/coverController";

/**
 * @function createCoverRouter
 * @description Binds the controller's handlers to their paths
 */
export function createCoverRouter(controller: CoverController): express.Router {
  const router = express.Router();

  // Health check
  router.get("/health", controller.healthCheck);

  // Session lifecycle
  router.post("/sessions", controller.createSession);
  router.get("/sessions/:sessionId", controller.getSession);
  router.delete("/sessions/:sessionId", controller.deleteSession);

  // Wizard commands and output
  router.post("/sessions/:sessionId/commands", controller.sendCommand);
  router.get("/sessions/:sessionId/audio", controller.getAudio);

  return router;
}
