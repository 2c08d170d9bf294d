/**
 * @file axios.ts
 * @description Helpers for building axios failures in client tests
 */

import { AxiosError, AxiosHeaders } from "axios";

/**
 * @function httpError
 * @description AxiosError carrying a response with the given status
 */
export const httpError = (status: number, data: unknown = {}): AxiosError => {
  const config = { headers: new AxiosHeaders() };
  return new AxiosError(
    `Request failed with status code ${status}`,
    "ERR_BAD_RESPONSE",
    config,
    {},
    { status, statusText: "", headers: {}, config, data }
  );
};

/**
 * @function networkError
 * @description AxiosError without a response, as raised on refused connections or timeouts
 */
export const networkError = (code: string, message: string): AxiosError =>
  new AxiosError(message, code, { headers: new AxiosHeaders() }, {});
