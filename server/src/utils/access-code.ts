import crypto from "crypto";

export const ACCESS_CODE_ALPHABET = "ABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789";
export const ACCESS_CODE_LENGTH = 8;

export function generateAccessCode(length = ACCESS_CODE_LENGTH): string {
  let code = "";
  for (let i = 0; i < length; i++) {
    code += ACCESS_CODE_ALPHABET[crypto.randomInt(ACCESS_CODE_ALPHABET.length)];
  }
  return code;
}

/** Upper-cases and drops anything outside the alphabet, as typed codes often carry spaces or dashes. */
export function normalizeAccessCode(input: string): string {
  return input.toUpperCase().replace(/[^A-Z0-9]/g, "");
}
