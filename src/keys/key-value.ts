/**
 * Wraps key text in the attribute value of its key type.
 */

import type { KeyAttributeType } from "../types/table.js";
import type { KeyAttributeValue } from "../marshalling/types.js";

const utf8Encoder = new TextEncoder();

/**
 * Whether `text` is canonical padded base64, the form a constant binary
 * pattern must take.
 */
export const isBase64 = (text: string): boolean =>
  Buffer.from(text, "base64").toString("base64") === text;

/**
 * Wraps key text as an `S`, `N` or `B` attribute value.
 *
 * Binary keys built from a constant pattern are written in the pattern as
 * base64 and decoded here; any other binary key is the UTF-8 bytes of its
 * text.
 *
 * @example
 * ```ts
 * toKeyAttributeValue("B", "UFJPRklMRQ==", true); // { B: <bytes of "PROFILE"> }
 * ```
 */
export const toKeyAttributeValue = (
  kind: KeyAttributeType,
  text: string,
  constant: boolean,
): KeyAttributeValue => {
  switch (kind) {
    case "S":
      return { S: text };
    case "N":
      return { N: text };
    case "B":
      return {
        B: constant
          ? new Uint8Array(Buffer.from(text, "base64"))
          : utf8Encoder.encode(text),
      };
  }
};
