/**
 * @file commands.ts
 * @description Validation of workflow commands received as JSON
 */

import { ValidationError } from "../errors/coverError";
import {
  MIXER_BALANCES,
  MixerBalance,
  MixerSettings,
  OUTPUT_FORMATS,
  OutputFormat,
} from "../models/cover";
import { GenerateCoverCommand, WorkflowCommand } from "../models/workflow";
import { isRecord } from "../utils/utils";

function requireString(body: Record<string, unknown>, field: string): string {
  const value = body[field];
  if (typeof value !== "string") {
    throw new ValidationError(`"${field}" must be a string`);
  }
  return value;
}

function isOutputFormat(value: unknown): value is OutputFormat {
  return OUTPUT_FORMATS.some((format) => format === value);
}

function isMixerBalance(value: unknown): value is MixerBalance {
  return MIXER_BALANCES.some((balance) => balance === value);
}

/**
 * @function parseMixer
 * @description Volume must be 0-100, balance one of left / center / right
 */
function parseMixer(value: unknown): Partial<MixerSettings> {
  if (!isRecord(value)) {
    throw new ValidationError(`"mixer" must be an object`);
  }
  const mixer: Partial<MixerSettings> = {};
  if (value.volume !== undefined) {
    if (
      typeof value.volume !== "number" ||
      !Number.isInteger(value.volume) ||
      value.volume < 0 ||
      value.volume > 100
    ) {
      throw new ValidationError(
        `"mixer.volume" must be an integer between 0 and 100`
      );
    }
    mixer.volume = value.volume;
  }
  if (value.balance !== undefined) {
    if (!isMixerBalance(value.balance)) {
      throw new ValidationError(
        `"mixer.balance" must be one of ${MIXER_BALANCES.join(", ")}`
      );
    }
    mixer.balance = value.balance;
  }
  return mixer;
}

/**
 * @function parseCommand
 * @description Checks the shape of a command body
 * @param {unknown} body - Parsed JSON request body
 * @returns {WorkflowCommand} The typed command
 * @throws {ValidationError} If the type is unknown or a field has the wrong shape
 */
export function parseCommand(body: unknown): WorkflowCommand {
  if (!isRecord(body)) {
    throw new ValidationError("Command must be a JSON object");
  }

  switch (body.type) {
    case "ConfirmManualIds":
      return {
        type: "ConfirmManualIds",
        voiceId: requireString(body, "voiceId"),
        instrumentalId: requireString(body, "instrumentalId"),
      };
    case "AdvanceStep":
      return { type: "AdvanceStep" };
    case "ExtractVocals":
      return { type: "ExtractVocals", url: requireString(body, "url") };
    case "UploadInstrumental":
      return { type: "UploadInstrumental", url: requireString(body, "url") };
    case "GenerateCover": {
      const command: GenerateCoverCommand = { type: "GenerateCover" };
      if (body.lyrics !== undefined) {
        command.lyrics = requireString(body, "lyrics");
      }
      if (body.outputFormat !== undefined) {
        if (!isOutputFormat(body.outputFormat)) {
          throw new ValidationError(
            `"outputFormat" must be one of ${OUTPUT_FORMATS.join(", ")}`
          );
        }
        command.outputFormat = body.outputFormat;
      }
      if (body.mixer !== undefined) {
        command.mixer = parseMixer(body.mixer);
      }
      return command;
    }
    default:
      throw new ValidationError(
        `Unknown command type: ${String(body.type)}`
      );
  }
}
