/**
 * @file coverWorkflow.ts
 * @description Three-step state machine for creating an AI cover
 */

import { CoverError, FailureKind, ValidationError } from "../errors/coverError";
import {
  CoverArtifact,
  DEFAULT_AUDIO_SETTING,
  DEFAULT_MIXER,
  DEFAULT_MODEL,
} from "../models/cover";
import {
  CommandResult,
  GenerateCoverCommand,
  GenerationState,
  InstrumentalAcquisitionState,
  Notice,
  SourceAcquisitionState,
  WorkflowCommand,
  WorkflowState,
  WorkflowStep,
} from "../models/workflow";
import { GenerationClient } from "../clients/generationClient";
import { UploadClient } from "../clients/uploadClient";
import { AudioArtifactStore } from "../services/audioArtifacts";
import { MediaFetcher } from "../services/mediaFetcher";
import { DEFAULT_LYRICS, formatLyrics } from "../utils/lyrics";
import { Logger } from "../utils/logger";
import { errorMessage } from "../utils/utils";

/**
 * @interface WorkflowDependencies
 * @description External collaborators the wizard drives
 */
export interface WorkflowDependencies {
  mediaFetcher: Pick<MediaFetcher, "fetch">;
  uploadClient: Pick<UploadClient, "upload">;
  generationClient: Pick<GenerationClient, "generate">;
  artifactStore: Pick<AudioArtifactStore, "save">;
}

/**
 * @function initialState
 * @description State of a freshly opened wizard
 */
export function initialState(): WorkflowState {
  return { step: WorkflowStep.SOURCE_ACQUISITION };
}

/**
 * @function enterGeneration
 * @description Step 3 state with default lyrics, mixer and output format
 */
export function enterGeneration(
  voiceId: string,
  instrumentalId: string
): GenerationState {
  return {
    step: WorkflowStep.GENERATION,
    voiceId,
    instrumentalId,
    lyrics: DEFAULT_LYRICS,
    mixer: { ...DEFAULT_MIXER },
    outputFormat: "mp3",
  };
}

const success = (message: string): Notice => ({ level: "success", message });

/**
 * @function failureKindOf
 * @description Failure kind reported when a command fails unexpectedly
 */
const failureKindOf = (command: WorkflowCommand): FailureKind => {
  switch (command.type) {
    case "ExtractVocals":
      return FailureKind.EXTRACTION;
    case "UploadInstrumental":
      return FailureKind.UPLOAD;
    case "GenerateCover":
      return FailureKind.GENERATION;
    default:
      return FailureKind.VALIDATION;
  }
};

const failure = (error: CoverError): Notice => ({
  level: "error",
  message: error.details || error.message,
  failure: error.kind,
});

/**
 * @class CoverWorkflow
 * @description Applies commands to a workflow state. Failures are reported as notices and leave the step unchanged.
 */
export class CoverWorkflow {
  constructor(private readonly deps: WorkflowDependencies) {}

  /**
   * @method dispatch
   * @description Runs one command against the given state
   * @param {WorkflowState} state - Current session state
   * @param {WorkflowCommand} command - User action
   * @returns {Promise<CommandResult>} The next state and the notice to show
   */
  async dispatch(
    state: WorkflowState,
    command: WorkflowCommand
  ): Promise<CommandResult> {
    Logger.debug(`Step ${state.step} <- ${command.type}`);
    try {
      switch (state.step) {
        case WorkflowStep.SOURCE_ACQUISITION:
          return await this.handleSourceAcquisition(state, command);
        case WorkflowStep.INSTRUMENTAL_ACQUISITION:
          return await this.handleInstrumentalAcquisition(state, command);
        case WorkflowStep.GENERATION:
          return await this.handleGeneration(state, command);
      }
    } catch (error) {
      Logger.error(
        `Unexpected error while handling ${command.type}: ${errorMessage(error)}`
      );
      return {
        state,
        notice: {
          level: "error",
          message: `${command.type} failed: ${errorMessage(error)}`,
          failure: failureKindOf(command),
        },
      };
    }
  }

  private rejectCommand(
    state: WorkflowState,
    command: WorkflowCommand
  ): CommandResult {
    return {
      state,
      notice: failure(
        new ValidationError(
          `${command.type} is not available in step ${state.step}`
        )
      ),
    };
  }

  /**
   * @private
   * @method acquire
   * @description fetch -> upload chain shared by steps 1 and 2
   */
  private async acquire(
    url: string,
    fileTag: string,
    purpose: "voice" | "song"
  ): Promise<{ id: string } | { error: CoverError }> {
    const fetched = await this.deps.mediaFetcher.fetch(url, fileTag);
    if (!fetched.ok) {
      return { error: fetched.error };
    }
    const uploaded = await this.deps.uploadClient.upload(fetched.value, purpose);
    if (!uploaded.ok) {
      return { error: uploaded.error };
    }
    return { id: uploaded.value.assignedId };
  }

  private async handleSourceAcquisition(
    state: SourceAcquisitionState,
    command: WorkflowCommand
  ): Promise<CommandResult> {
    switch (command.type) {
      case "ConfirmManualIds": {
        const voiceId = command.voiceId;
        const instrumentalId = command.instrumentalId;
        if (!voiceId.trim() || !instrumentalId.trim()) {
          return {
            state,
            notice: failure(
              new ValidationError(
                "Both a voice id and an instrumental id must be entered."
              )
            ),
          };
        }
        Logger.info("Manual ids confirmed, skipping to generation");
        return {
          state: enterGeneration(voiceId, instrumentalId),
          notice: success("IDs confirmed successfully!"),
        };
      }
      case "ExtractVocals": {
        const result = await this.acquire(command.url, "voice", "voice");
        if ("error" in result) {
          return { state, notice: failure(result.error) };
        }
        return {
          state: { ...state, voiceId: result.id },
          notice: success(`Obtained voice_id: ${result.id}`),
        };
      }
      case "AdvanceStep":
        if (!state.voiceId) {
          return {
            state,
            notice: failure(
              new ValidationError(
                "Extract vocals or confirm manual ids before moving on."
              )
            ),
          };
        }
        return {
          state: {
            step: WorkflowStep.INSTRUMENTAL_ACQUISITION,
            voiceId: state.voiceId,
          },
          notice: success("Moved to step 2: instrumental upload"),
        };
      default:
        return this.rejectCommand(state, command);
    }
  }

  private async handleInstrumentalAcquisition(
    state: InstrumentalAcquisitionState,
    command: WorkflowCommand
  ): Promise<CommandResult> {
    switch (command.type) {
      case "UploadInstrumental": {
        const result = await this.acquire(command.url, "instrumental", "song");
        if ("error" in result) {
          return { state, notice: failure(result.error) };
        }
        return {
          state: { ...state, instrumentalId: result.id },
          notice: success(`Obtained instrumental_id: ${result.id}`),
        };
      }
      case "AdvanceStep":
        if (!state.instrumentalId) {
          return {
            state,
            notice: failure(
              new ValidationError("Upload an instrumental before moving on.")
            ),
          };
        }
        return {
          state: enterGeneration(state.voiceId, state.instrumentalId),
          notice: success("Moved to step 3: music generation"),
        };
      default:
        return this.rejectCommand(state, command);
    }
  }

  private async handleGeneration(
    state: GenerationState,
    command: WorkflowCommand
  ): Promise<CommandResult> {
    if (command.type !== "GenerateCover") {
      return this.rejectCommand(state, command);
    }
    return this.generateCover(state, command);
  }

  /**
   * @private
   * @method generateCover
   * @description Formats lyrics, generates audio and stores it. The session stays in step 3 either way.
   */
  private async generateCover(
    state: GenerationState,
    command: GenerateCoverCommand
  ): Promise<CommandResult> {
    if (command.mixer) {
      Logger.warn("Mixer settings are recorded but not applied to generated audio");
    }
    const next: GenerationState = {
      ...state,
      lyrics: command.lyrics ?? state.lyrics,
      outputFormat: command.outputFormat ?? state.outputFormat,
      mixer: { ...state.mixer, ...command.mixer },
    };

    if (!next.lyrics.trim()) {
      return {
        state: next,
        notice: failure(
          new ValidationError("Lyrics are required for music generation.")
        ),
      };
    }

    const generated = await this.deps.generationClient.generate({
      referVoice: next.voiceId,
      referInstrumental: next.instrumentalId,
      lyrics: formatLyrics(next.lyrics),
      model: DEFAULT_MODEL,
      stream: false,
      audioSetting: { ...DEFAULT_AUDIO_SETTING },
    });
    if (!generated.ok) {
      return { state: next, notice: failure(generated.error) };
    }

    let artifact: CoverArtifact;
    try {
      artifact = await this.deps.artifactStore.save(
        generated.value,
        next.outputFormat
      );
    } catch (error) {
      Logger.error(`Error writing generated audio: ${errorMessage(error)}`);
      return {
        state: next,
        notice: {
          level: "error",
          message: `Error saving generated audio: ${errorMessage(error)}`,
          failure: FailureKind.GENERATION,
        },
      };
    }
    Logger.success(`AI Cover written to ${artifact.filePath}`);
    return {
      state: { ...next, lastArtifact: artifact },
      notice: success("AI Cover generated successfully!"),
    };
  }
}
