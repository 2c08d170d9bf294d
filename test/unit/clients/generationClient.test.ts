/**
 * @file generationClient.test.ts
 * @description Unit tests for GenerationClient
 */

import axios from "axios";
import {
  GenerationClient,
  decodeHexAudio,
} from "../../../src/clients/generationClient";
import { CoverErrorCode, FailureKind } from "../../../src/errors/coverError";
import { GenerationOptions } from "../../../src/models/cover";
import { httpError, networkError } from "../../mocks/axios";

// Mock Logger to keep console output clean
jest.mock("../../../src/utils/logger", () => ({
  Logger: {
    info: jest.fn(),
    error: jest.fn(),
    warn: jest.fn(),
    debug: jest.fn(),
    success: jest.fn(),
  },
}));

jest.mock("axios", () => {
  const actual = jest.requireActual("axios");
  return {
    __esModule: true,
    ...actual,
    default: { post: jest.fn(), isAxiosError: actual.isAxiosError },
  };
});
const mockedPost = jest.mocked(axios.post);

describe("decodeHexAudio", () => {
  it("should decode whole-byte hex", () => {
    expect(decodeHexAudio("68656c6c6f")?.toString("utf8")).toBe("hello");
  });

  it("should reject odd length or non-hex input", () => {
    expect(decodeHexAudio("abc")).toBeNull();
    expect(decodeHexAudio("zz11")).toBeNull();
    expect(decodeHexAudio("")).toBeNull();
  });
});

describe("GenerationClient", () => {
  const FAKE_API_KEY = "test-minimax-key";
  let client: GenerationClient;
  const options: GenerationOptions = {
    referVoice: "v1",
    referInstrumental: "i1",
    lyrics: "##line one\nline two##",
  };

  beforeEach(() => {
    jest.clearAllMocks();
    client = new GenerationClient({
      apiKey: FAKE_API_KEY,
      baseUrl: "https://minimax.test/",
    });
  });

  describe("buildRequest", () => {
    it("should apply model, stream and audio setting defaults", () => {
      expect(client.buildRequest(options)).toEqual({
        refer_voice: "v1",
        refer_instrumental: "i1",
        lyrics: "##line one\nline two##",
        model: "music-01",
        stream: false,
        audio_setting: { sample_rate: 44100, bitrate: 256000, format: "mp3" },
      });
    });
  });

  describe("generate", () => {
    it("should post JSON with bearer auth and a 60 second timeout", async () => {
      mockedPost.mockResolvedValueOnce({
        status: 200,
        data: { data: { audio: "68656c6c6f" }, base_resp: { status_code: 0 } },
      });

      await client.generate(options);

      expect(mockedPost).toHaveBeenCalledWith(
        "https://minimax.test/v1/music_generation",
        {
          refer_voice: "v1",
          refer_instrumental: "i1",
          lyrics: "##line one\nline two##",
          model: "music-01",
          stream: false,
          audio_setting: { sample_rate: 44100, bitrate: 256000, format: "mp3" },
        },
        {
          headers: {
            Authorization: `Bearer ${FAKE_API_KEY}`,
            "Content-Type": "application/json",
          },
          timeout: 60000,
        }
      );
    });

    it("should decode data.audio into raw bytes", async () => {
      mockedPost.mockResolvedValueOnce({
        status: 200,
        data: { data: { audio: "68656c6c6f" } },
      });

      const result = await client.generate(options);

      expect(result.ok).toBe(true);
      if (result.ok) {
        expect(result.value).toEqual(Buffer.from("hello"));
      }
    });

    it("should report a missing data.audio field", async () => {
      mockedPost.mockResolvedValueOnce({ status: 200, data: { data: {} } });

      const result = await client.generate(options);

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.kind).toBe(FailureKind.GENERATION);
        expect(result.error.code).toBe(CoverErrorCode.MISSING_AUDIO);
      }
    });

    it("should report a response without a data object", async () => {
      mockedPost.mockResolvedValueOnce({ status: 200, data: { trace_id: "t" } });

      const result = await client.generate(options);

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.code).toBe(CoverErrorCode.MISSING_AUDIO);
      }
    });

    it("should report non-hex audio content", async () => {
      mockedPost.mockResolvedValueOnce({
        status: 200,
        data: { data: { audio: "not-hex-at-all" } },
      });

      const result = await client.generate(options);

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.kind).toBe(FailureKind.GENERATION);
        expect(result.error.code).toBe(CoverErrorCode.MALFORMED_AUDIO);
      }
    });

    it("should report non-2xx responses", async () => {
      mockedPost.mockRejectedValueOnce(httpError(502));

      const result = await client.generate(options);

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.kind).toBe(FailureKind.GENERATION);
        expect(result.error.code).toBe(CoverErrorCode.API_ERROR);
        expect(result.error.status).toBe(502);
      }
    });

    it("should report network errors", async () => {
      mockedPost.mockRejectedValueOnce(
        networkError("ENOTFOUND", "getaddrinfo ENOTFOUND minimax.test")
      );

      const result = await client.generate(options);

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.code).toBe(CoverErrorCode.NETWORK_ERROR);
      }
    });

    it("should surface base_resp errors returned with HTTP 200", async () => {
      mockedPost.mockResolvedValueOnce({
        status: 200,
        data: {
          data: null,
          base_resp: { status_code: 2013, status_msg: "invalid params" },
        },
      });

      const result = await client.generate(options);

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.code).toBe(CoverErrorCode.API_ERROR);
        expect(result.error.details).toBe("status_code 2013: invalid params");
      }
    });

    it("should refuse empty lyrics without calling the API", async () => {
      const result = await client.generate({ ...options, lyrics: "  " });

      expect(mockedPost).not.toHaveBeenCalled();
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.kind).toBe(FailureKind.VALIDATION);
      }
    });

    it("should refuse a missing reference id without calling the API", async () => {
      const result = await client.generate({ ...options, referInstrumental: "" });

      expect(mockedPost).not.toHaveBeenCalled();
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.kind).toBe(FailureKind.VALIDATION);
      }
    });
  });
});
