/**
 * @file lyrics.ts
 * @description Lyric formatting for the music generation endpoint
 */

export const LYRICS_DELIMITER = "##";

export const DEFAULT_LYRICS = `Walking down the line
I bumped right into you
Could feel it from a mile
And I know you feel it too`;

/**
 * @function formatLyrics
 * @description Drops blank lines, trims the rest and wraps the block in the lyric delimiter
 * @param {string} lyrics - Free-form lyrics as typed by the user
 * @returns {string} e.g. "##line one\nline two##"
 */
export function formatLyrics(lyrics: string): string {
  const lines = lyrics
    .trim()
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
  return `${LYRICS_DELIMITER}${lines.join("\n")}${LYRICS_DELIMITER}`;
}
