/**
 * Script that walks the cover wizard over HTTP.
 * With VOICE_ID and INSTRUMENTAL_ID set it confirms them manually,
 * otherwise it extracts VOICE_URL and INSTRUMENTAL_URL first.
 */

import axios, { AxiosError } from "axios";
import type { SessionView } from "../src/controllers/coverController";
import type { Notice, WorkflowCommand } from "../src/models/workflow";

// Configuration
const CONFIG = {
  serverUrl: process.env.SERVER_URL || "http://localhost:8003",
  voiceId: process.env.VOICE_ID || "",
  instrumentalId: process.env.INSTRUMENTAL_ID || "",
  voiceUrl: process.env.VOICE_URL || "",
  instrumentalUrl: process.env.INSTRUMENTAL_URL || "",
  lyrics: process.env.LYRICS,
  outputFormat: process.env.OUTPUT_FORMAT === "wav" ? "wav" : "mp3",
} as const;

interface CommandResponse {
  session: SessionView;
  notice: Notice;
}

/**
 * Checks if the server is running by making a health check request
 * @returns {Promise<boolean>} True if server is running, false otherwise
 */
async function isServerRunning(): Promise<boolean> {
  try {
    const response = await axios.get(`${CONFIG.serverUrl}/health`);
    return response.status === 200;
  } catch (error) {
    if (error instanceof AxiosError) {
      console.error("Server connection error:", error.message);
    } else {
      console.error("Unknown error:", error);
    }
    return false;
  }
}

/**
 * Sends one command and fails on an error notice
 */
async function send(
  sessionId: string,
  command: WorkflowCommand
): Promise<SessionView> {
  console.log(`-> ${command.type}`);
  const response = await axios.post<CommandResponse>(
    `${CONFIG.serverUrl}/sessions/${sessionId}/commands`,
    command
  );
  const { session, notice } = response.data;
  console.log(`<- [${notice.level}] ${notice.message}`);
  if (notice.level === "error") {
    throw new Error(`${command.type} failed (${notice.failure}): ${notice.message}`);
  }
  return session;
}

/**
 * Main function to create a cover
 * @returns {Promise<SessionView>} Final session, including the generated artifact
 */
async function generateCover(): Promise<SessionView> {
  if (!(await isServerRunning())) {
    throw new Error(`No server reachable at ${CONFIG.serverUrl}`);
  }

  const created = await axios.post<SessionView>(`${CONFIG.serverUrl}/sessions`);
  const sessionId = created.data.id;
  console.log(`Session created with ID: ${sessionId}`);

  if (CONFIG.voiceId && CONFIG.instrumentalId) {
    await send(sessionId, {
      type: "ConfirmManualIds",
      voiceId: CONFIG.voiceId,
      instrumentalId: CONFIG.instrumentalId,
    });
  } else {
    if (!CONFIG.voiceUrl || !CONFIG.instrumentalUrl) {
      throw new Error(
        "Set VOICE_ID and INSTRUMENTAL_ID, or VOICE_URL and INSTRUMENTAL_URL"
      );
    }
    await send(sessionId, { type: "ExtractVocals", url: CONFIG.voiceUrl });
    await send(sessionId, { type: "AdvanceStep" });
    await send(sessionId, {
      type: "UploadInstrumental",
      url: CONFIG.instrumentalUrl,
    });
    await send(sessionId, { type: "AdvanceStep" });
  }

  return send(sessionId, {
    type: "GenerateCover",
    lyrics: CONFIG.lyrics,
    outputFormat: CONFIG.outputFormat,
  });
}

if (require.main === module) {
  generateCover()
    .then((session) => {
      const artifact = session.artifact;
      console.log("Generated cover:", {
        fileName: artifact?.fileName,
        durationSeconds: artifact?.durationSeconds,
        audioUrl: artifact ? `${CONFIG.serverUrl}${artifact.audioUrl}` : null,
      });
    })
    .catch((error: unknown) => {
      console.error(
        "Failed to generate cover:",
        error instanceof Error ? error.message : error
      );
      process.exit(1);
    });
}

export { generateCover, isServerRunning };
