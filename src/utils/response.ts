import { errorMessage } from "./errors.js";

export const ERROR_PREFIX = "ERROR: ";

/** Tool results are plain text; failures are reported in-band, never as protocol errors. */
export function formatText(text: string) {
  return {
    content: [
      {
        type: "text" as const,
        text,
      },
    ],
  };
}

export function errorText(err: unknown): string {
  return `${ERROR_PREFIX}${errorMessage(err)}`;
}
