/**
 * @file coverController.ts
 * @description Express handlers that drive the cover wizard over HTTP
 */

import { Request, Response } from "express";
import { CoverWorkflow } from "../core/coverWorkflow";
import { parseCommand } from "../core/commands";
import { ErrorHandler } from "../core/errorHandler";
import { SessionManager, WorkflowSession } from "../core/sessionManager";
import { CoverArtifact } from "../models/cover";
import { WorkflowStep } from "../models/workflow";
import { Logger } from "../utils/logger";

/**
 * @interface SessionView
 * @description Session as returned to the client; the artifact's file path stays server-side
 */
export interface SessionView {
  id: string;
  createdAt: string;
  updatedAt: string;
  step: WorkflowStep;
  voiceId?: string;
  instrumentalId?: string;
  lyrics?: string;
  mixer?: { volume: number; balance: string };
  outputFormat?: string;
  artifact?: Omit<CoverArtifact, "filePath"> & { audioUrl: string };
}

/**
 * @function toSessionView
 * @description Flattens the tagged workflow state into the public session shape
 */
export function toSessionView(session: WorkflowSession): SessionView {
  const { state } = session;
  const view: SessionView = {
    id: session.id,
    createdAt: session.createdAt,
    updatedAt: session.updatedAt,
    step: state.step,
    voiceId: state.voiceId,
  };

  if (state.step === WorkflowStep.INSTRUMENTAL_ACQUISITION) {
    view.instrumentalId = state.instrumentalId;
  }
  if (state.step === WorkflowStep.GENERATION) {
    view.instrumentalId = state.instrumentalId;
    view.lyrics = state.lyrics;
    view.mixer = state.mixer;
    view.outputFormat = state.outputFormat;
    if (state.lastArtifact) {
      const { filePath, ...artifact } = state.lastArtifact;
      view.artifact = {
        ...artifact,
        audioUrl: `/sessions/${session.id}/audio`,
      };
    }
  }
  return view;
}

/**
 * @class CoverController
 * @description Session lifecycle and command dispatch for the cover wizard
 */
export class CoverController {
  /**
   * @constructor
   * @param {CoverWorkflow} workflow - State machine applied to each command
   * @param {SessionManager} sessionManager - Optional session manager instance
   */
  constructor(
    private readonly workflow: CoverWorkflow,
    private readonly sessionManager: SessionManager = new SessionManager()
  ) {}

  /**
   * @method healthCheck
   * @description Liveness probe
   */
  public healthCheck = async (req: Request, res: Response): Promise<void> => {
    res.json({ status: "ok" });
  };

  /**
   * @method createSession
   * @description Opens a wizard at step 1
   */
  public createSession = async (req: Request, res: Response): Promise<void> => {
    const session = this.sessionManager.createSession();
    Logger.info(`Created session ${session.id}`);
    res.status(201).json(toSessionView(session));
  };

  /**
   * @method getSession
   * @description Current step and collected values of a session
   */
  public getSession = async (req: Request, res: Response): Promise<void> => {
    const session = this.sessionManager.getSession(req.params.sessionId);
    if (!session) {
      res.status(404).json({ error: "Session not found" });
      return;
    }
    res.json(toSessionView(session));
  };

  /**
   * @method deleteSession
   */
  public deleteSession = async (req: Request, res: Response): Promise<void> => {
    if (!this.sessionManager.deleteSession(req.params.sessionId)) {
      res.status(404).json({ error: "Session not found" });
      return;
    }
    Logger.info(`Deleted session ${req.params.sessionId}`);
    res.status(204).end();
  };

  /**
   * @method sendCommand
   * @description Applies one command to a session. Workflow failures come back as an error notice with status 200.
   */
  public sendCommand = async (req: Request, res: Response): Promise<void> => {
    const { sessionId } = req.params;
    try {
      const session = this.sessionManager.getSession(sessionId);
      if (!session) {
        res.status(404).json({ error: "Session not found" });
        return;
      }

      const command = parseCommand(req.body);

      if (!this.sessionManager.acquire(sessionId)) {
        Logger.warn(`Session ${sessionId} is busy, rejecting ${command.type}`);
        res
          .status(409)
          .json({ error: "Another command is still running for this session" });
        return;
      }

      try {
        Logger.info(`Session ${sessionId}: ${command.type}`);
        const result = await this.workflow.dispatch(session.state, command);
        const updated =
          this.sessionManager.updateSession(sessionId, result.state) || session;
        res.json({ session: toSessionView(updated), notice: result.notice });
      } finally {
        this.sessionManager.release(sessionId);
      }
    } catch (error) {
      ErrorHandler.handleHttpError(error, res);
    }
  };

  /**
   * @method getAudio
   * @description Streams the latest generated cover for inline playback
   */
  public getAudio = async (req: Request, res: Response): Promise<void> => {
    const session = this.sessionManager.getSession(req.params.sessionId);
    if (
      !session ||
      session.state.step !== WorkflowStep.GENERATION ||
      !session.state.lastArtifact
    ) {
      res.status(404).json({ error: "No generated audio for this session" });
      return;
    }
    const artifact = session.state.lastArtifact;
    res.type(artifact.mimeType);
    res.sendFile(artifact.filePath, (error?: Error) => {
      if (error && !res.headersSent) {
        ErrorHandler.handleHttpError(error, res);
      } else if (error) {
        Logger.error(`Error streaming ${artifact.filePath}: ${error.message}`);
      }
    });
  };
}
