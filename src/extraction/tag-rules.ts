/**
 * Which tagged elements are address candidates
 *
 * An element qualifies when it carries a structure key (a building, an
 * amenity, a small place...) and a descriptive address key.
 */

export interface TagRule {
  /** Any of these keys marks a physical structure */
  structureKeys: readonly string[];
  /** `place=<value>` also counts as a structure for these values */
  placeValues: readonly string[];
  /** At least one of these must be present as well */
  descriptiveKeys: readonly string[];
}

export const defaultTagRule: TagRule = {
  structureKeys: ['building', 'amenity', 'shop', 'tourism', 'leisure', 'office'],
  placeValues: ['neighbourhood', 'suburb', 'quarter', 'hamlet', 'isolated_dwelling'],
  descriptiveKeys: ['addr:street'],
};

export function matchesTagRule(tags: Readonly<Record<string, string>>, rule: TagRule = defaultTagRule): boolean {
  const hasStructure =
    rule.structureKeys.some((key) => key in tags) ||
    (tags.place !== undefined && rule.placeValues.includes(tags.place));

  return hasStructure && rule.descriptiveKeys.some((key) => key in tags);
}
