import { TAGGER_CONFIG } from '../config';
import type { InterestTagSet } from '../types';

/**
 * Picks the name of the appended tags column. An existing column with the
 * same name is never reused; a counter is added instead.
 */
export function resolveTagsColumn(
  existingColumns: readonly string[],
  preferredName: string = TAGGER_CONFIG.OUTPUT.TAGS_COLUMN,
): string {
  const taken = new Set(existingColumns.map(column => column.trim().toLowerCase()));

  let finalName = preferredName;
  let counter = 1;

  while (taken.has(finalName.toLowerCase())) {
    counter++;
    finalName = `${preferredName} ${counter}`;
  }

  return finalName;
}

/** All tags of a row go in one cell so every row has the same columns. */
export function formatTags(tags: InterestTagSet, delimiter: string = TAGGER_CONFIG.OUTPUT.TAG_DELIMITER): string {
  return tags.join(delimiter);
}
