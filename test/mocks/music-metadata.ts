/**
 * @file music-metadata.ts
 * @description Mock implementation of the music-metadata module for testing purposes
 */

/**
 * @function parseBuffer
 * @description Reports a fixed 180 second duration for any non-empty buffer
 */
export const parseBuffer = jest
  .fn()
  .mockImplementation(async (buffer: Uint8Array, mimeType?: string) => {
    if (buffer.length === 0) {
      throw new Error("End-Of-Stream");
    }
    return {
      format: {
        tagTypes: [],
        trackInfo: [],
        duration: 180.6,
        bitrate: 256000,
        sampleRate: 44100,
        numberOfChannels: 2,
        container: mimeType === "audio/wav" ? "WAVE" : "MPEG",
        lossless: mimeType === "audio/wav",
      },
      common: {
        track: { no: null, of: null },
        disk: { no: null, of: null },
        movementIndex: {},
      },
      quality: { warnings: [] },
      native: {},
    };
  });
