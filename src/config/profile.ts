import type { ProfileName } from "../core/types.js";
import { ValidationError } from "../core/errors.js";

export const DEFAULT_PROFILE = "default" as ProfileName;

const PROFILE_NAME_PATTERN = /^[A-Za-z0-9_-]+$/;

/**
 * Validate a profile name from user input. Profile names become part of a
 * file name, so only letters, digits, `_` and `-` are accepted.
 */
export function parseProfileName(raw: string | undefined): ProfileName {
  if (raw === undefined) return DEFAULT_PROFILE;

  const name = raw.trim();
  if (!PROFILE_NAME_PATTERN.test(name)) {
    throw new ValidationError(
      `Invalid profile name "${raw}": use letters, digits, "_" or "-"`,
    );
  }
  return name as ProfileName;
}
