/**
 * Display-name cleanup before validation
 *
 * Strips characters the geocoder leaks into display names, then applies the
 * territory rules from territories.json so dependent and disputed territories
 * carry the name they are harvested under.
 */

import type { TerritoryRules } from '../config/static-data.js';

const DISPLAY_NAME_NOISE = /[`:%$@*^[\]{}_«»]/g;

function collapseWhitespace(text: string): string {
  return text.split(/\s+/).filter(Boolean).join(' ');
}

function stripSeparators(text: string): string {
  return text.replace(/^[,\s]+|[,\s]+$/g, '');
}

function sameName(a: string, b: string): boolean {
  return a.trim().toLowerCase() === b.trim().toLowerCase();
}

function findAppendRule(rules: TerritoryRules, claimedCountry: string) {
  return rules.appendTerritories.find((rule) => sameName(rule.territory, claimedCountry));
}

/**
 * Rebuild a territory's display name: drop the administering country and the
 * territory's own spelling, then append the harvested territory name
 */
function appendTerritory(text: string, territory: string, variant: string, geocoderCountry: string | undefined): string {
  let result = text;
  if (geocoderCountry && result.includes(geocoderCountry)) {
    result = stripSeparators(result.replaceAll(geocoderCountry, '').trim().replaceAll(',,', ','));
  }
  if (result.includes(variant)) {
    result = stripSeparators(result.replaceAll(variant, ''));
  }
  return result ? `${result}, ${territory}` : territory;
}

export function cleanDisplayName(
  displayName: string,
  claimedCountry: string,
  geocoderCountry: string | undefined,
  rules: TerritoryRules
): string {
  let text = displayName.replace(DISPLAY_NAME_NOISE, ' ');

  for (const rule of rules.replacements) {
    if (rule.countries && !rule.countries.some((country) => sameName(country, claimedCountry))) {
      continue;
    }
    text = text.replaceAll(rule.variant, rule.replacement);
  }

  const appendRule = findAppendRule(rules, claimedCountry);
  if (appendRule) {
    text = appendTerritory(text, appendRule.territory, appendRule.variant, geocoderCountry);
  }

  return collapseWhitespace(text);
}

/**
 * Country the region heuristic checks against. Territories harvested under
 * their own name use the claimed name; everything else trusts the geocoder.
 */
export function resolveRegionCountry(
  claimedCountry: string,
  geocoderCountry: string | undefined,
  rules: TerritoryRules
): string {
  const claimedOverride =
    rules.claimedRegionCountries.some((country) => sameName(country, claimedCountry)) ||
    findAppendRule(rules, claimedCountry) !== undefined;

  if (claimedOverride) {
    return claimedCountry;
  }
  return geocoderCountry?.trim() || claimedCountry;
}
