/**
 * Tag name charset
 *
 * Characters the tagging subsystem reserves; a tag containing any of them is
 * rejected when the configuration is validated.
 */

export const FORBIDDEN_TAG_SET = '!@#$%^&*()=+<>,.:;"\'{}[]|\\ \t';

/** Tag applied to followers that do not name one */
export const DEFAULT_TAG_NAME = 'default';

/**
 * First forbidden character in a tag, or undefined if the tag is clean
 */
export function findForbiddenTagChar(tag: string): string | undefined {
  for (const ch of tag) {
    if (FORBIDDEN_TAG_SET.includes(ch)) {
      return ch;
    }
  }
  return undefined;
}

export function isValidTagName(tag: string): boolean {
  return tag.length > 0 && findForbiddenTagChar(tag) === undefined;
}
