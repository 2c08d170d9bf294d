/**
 * @file workflow.ts
 * @description States and commands of the cover creation wizard
 */

import { FailureKind } from "../errors/coverError";
import { CoverArtifact, MixerSettings, OutputFormat } from "./cover";

/**
 * @enum WorkflowStep
 * @description The three steps of the wizard, numbered as shown to the user
 */
export enum WorkflowStep {
  SOURCE_ACQUISITION = 1,
  INSTRUMENTAL_ACQUISITION = 2,
  GENERATION = 3,
}

export interface SourceAcquisitionState {
  step: WorkflowStep.SOURCE_ACQUISITION;
  voiceId?: string;
}

export interface InstrumentalAcquisitionState {
  step: WorkflowStep.INSTRUMENTAL_ACQUISITION;
  voiceId: string;
  instrumentalId?: string;
}

export interface GenerationState {
  step: WorkflowStep.GENERATION;
  voiceId: string;
  instrumentalId: string;
  lyrics: string;
  mixer: MixerSettings;
  outputFormat: OutputFormat;
  lastArtifact?: CoverArtifact;
}

export type WorkflowState =
  | SourceAcquisitionState
  | InstrumentalAcquisitionState
  | GenerationState;

export interface ConfirmManualIdsCommand {
  type: "ConfirmManualIds";
  voiceId: string;
  instrumentalId: string;
}

export interface AdvanceStepCommand {
  type: "AdvanceStep";
}

export interface ExtractVocalsCommand {
  type: "ExtractVocals";
  url: string;
}

export interface UploadInstrumentalCommand {
  type: "UploadInstrumental";
  url: string;
}

export interface GenerateCoverCommand {
  type: "GenerateCover";
  lyrics?: string;
  outputFormat?: OutputFormat;
  mixer?: Partial<MixerSettings>;
}

export type WorkflowCommand =
  | ConfirmManualIdsCommand
  | AdvanceStepCommand
  | ExtractVocalsCommand
  | UploadInstrumentalCommand
  | GenerateCoverCommand;

export type CommandType = WorkflowCommand["type"];

/**
 * @interface Notice
 * @description Inline message reported to the user after a command
 */
export interface Notice {
  level: "success" | "info" | "error";
  message: string;
  failure?: FailureKind;
}

/**
 * @interface CommandResult
 * @description New state and the notice produced by one command
 */
export interface CommandResult {
  state: WorkflowState;
  notice: Notice;
}
