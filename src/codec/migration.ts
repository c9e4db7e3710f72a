import type { Entry } from "../models";
import { DecodeError } from "../utils/errors";

/** Format version written into every new frame. */
export const CODEC_VERSION = 1;

type Migration = (entry: Entry) => Entry;

/**
 * Step `n` lifts an entry from version `n` to `n + 1`. Version 0 never
 * shipped a different layout, so its step only restamps the version.
 */
const MIGRATIONS: Record<number, Migration> = {
  0: (entry) => ({ ...entry, version: 1 }),
};

/** Brings a decoded entry up to `CODEC_VERSION`. */
export function migrate(entry: Entry): Entry {
  if (entry.version > CODEC_VERSION) {
    throw new DecodeError(
      `Entry "${entry.name}" was written by format version ${entry.version}; this build reads up to ${CODEC_VERSION}`,
    );
  }

  let current = entry;
  while (current.version < CODEC_VERSION) {
    const step = MIGRATIONS[current.version];
    if (!step) {
      throw new DecodeError(`No migration from format version ${current.version}`);
    }
    current = step(current);
  }
  return current;
}
