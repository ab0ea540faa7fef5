import { scanToUnescaped } from './utils';

/** @public */
export interface ReadPreferenceTag {
  readonly key: string;
  readonly value: string;
}

/**
 * The ordered tags of a single `readPreferenceTags` option.
 * @public
 */
export type TagGroup = readonly ReadPreferenceTag[];

/** @public */
export type TagSet = { [key: string]: string };

/**
 * Parses the value of one `readPreferenceTags` option into a tag group.
 *
 * Tags are separated by unescaped `,` and split on their first unescaped `:`. A tag without a
 * `:` is skipped rather than rejected, so this never throws; a value without a single usable tag
 * yields an empty group.
 */
export function parseTagGroup(value: string): TagGroup {
  const tags: ReadPreferenceTag[] = [];

  let start = 0;
  for (;;) {
    const comma = scanToUnescaped(value, ',', start);
    const entry = comma === -1 ? value.slice(start) : value.slice(start, comma);

    const colon = scanToUnescaped(entry, ':');
    if (colon !== -1) {
      tags.push(Object.freeze({ key: entry.slice(0, colon), value: entry.slice(colon + 1) }));
    }

    if (comma === -1) break;
    start = comma + 1;
  }

  return Object.freeze(tags);
}

/** Collapses a tag group into a tag set; a key repeated within the group keeps its last value. */
export function tagGroupToTagSet(group: TagGroup): TagSet {
  const tagSet: TagSet = Object.create(null);
  for (const { key, value } of group) {
    tagSet[key] = value;
  }
  return tagSet;
}
