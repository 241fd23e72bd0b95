import { describe, it, expect } from 'vitest';
import { matchesTagRule, type TagRule } from './tag-rules.js';

describe('matchesTagRule', () => {
  it('should accept a structure with a street', () => {
    expect(matchesTagRule({ building: 'yes', 'addr:street': 'Harbour Road' })).toBe(true);
    expect(matchesTagRule({ office: 'company', 'addr:street': 'Harbour Road' })).toBe(true);
  });

  it('should require a descriptive key', () => {
    expect(matchesTagRule({ building: 'yes', name: 'Depot' })).toBe(false);
  });

  it('should require a structure key', () => {
    expect(matchesTagRule({ 'addr:street': 'Harbour Road', highway: 'residential' })).toBe(false);
  });

  it('should accept only small places', () => {
    expect(matchesTagRule({ place: 'hamlet', 'addr:street': 'Harbour Road' })).toBe(true);
    expect(matchesTagRule({ place: 'city', 'addr:street': 'Harbour Road' })).toBe(false);
  });

  it('should honour a custom rule', () => {
    const rule: TagRule = { structureKeys: ['building'], placeValues: [], descriptiveKeys: ['addr:housenumber'] };

    expect(matchesTagRule({ building: 'yes', 'addr:housenumber': '4' }, rule)).toBe(true);
    expect(matchesTagRule({ building: 'yes', 'addr:street': 'Harbour Road' }, rule)).toBe(false);
  });
});
