/**
 * @file sessionManager.ts
 * @description Session management functionality
 */

import { v4 as uuidv4 } from "uuid";
import { WorkflowState } from "../models/workflow";
import { initialState } from "./coverWorkflow";

/**
 * @interface WorkflowSession
 * @description One user's pass through the wizard
 */
export interface WorkflowSession {
  id: string;
  createdAt: string;
  updatedAt: string;
  state: WorkflowState;
}

/**
 * @class SessionManager
 * @description Manages wizard sessions and their state. One command may run per session at a time.
 */
export class SessionManager {
  private sessions: Map<string, WorkflowSession>;
  private busy: Set<string>;

  constructor() {
    this.sessions = new Map();
    this.busy = new Set();
  }

  /**
   * @method createSession
   * @description Create a new session at step 1
   */
  public createSession(sessionId: string = uuidv4()): WorkflowSession {
    const now = new Date().toISOString();
    const session: WorkflowSession = {
      id: sessionId,
      createdAt: now,
      updatedAt: now,
      state: initialState(),
    };
    this.sessions.set(sessionId, session);
    return session;
  }

  /**
   * @method getSession
   * @description Get session by ID
   */
  public getSession(sessionId: string): WorkflowSession | undefined {
    return this.sessions.get(sessionId);
  }

  /**
   * @method updateSession
   * @description Replace the workflow state of a session
   */
  public updateSession(
    sessionId: string,
    state: WorkflowState
  ): WorkflowSession | undefined {
    const session = this.getSession(sessionId);
    if (!session) {
      return undefined;
    }
    const updated: WorkflowSession = {
      ...session,
      state,
      updatedAt: new Date().toISOString(),
    };
    this.sessions.set(sessionId, updated);
    return updated;
  }

  /**
   * @method deleteSession
   * @description Delete a session
   */
  public deleteSession(sessionId: string): boolean {
    this.busy.delete(sessionId);
    return this.sessions.delete(sessionId);
  }

  /**
   * @method acquire
   * @description Marks a session as running a command; false if one is already running
   */
  public acquire(sessionId: string): boolean {
    if (this.busy.has(sessionId)) {
      return false;
    }
    this.busy.add(sessionId);
    return true;
  }

  /**
   * @method release
   * @description Clears the running-command mark set by acquire
   */
  public release(sessionId: string): void {
    this.busy.delete(sessionId);
  }
}
