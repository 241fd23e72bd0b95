/**
 * Static configuration files under STATIC_DATA_DIR
 *
 * - countries.json: country name → ISO 3166-1 alpha-2 code (null when the
 *   country has no extract of its own)
 * - territories.json: display-name substitutions applied before validation
 * - regions.json: include/exclude boxes per country code
 */

import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { z } from 'zod';
import { logger } from '../domain/logger.js';

export const BoundingRegionSchema = z
  .object({
    name: z.string().optional(),
    minLon: z.number().min(-180).max(180),
    maxLon: z.number().min(-180).max(180),
    minLat: z.number().min(-90).max(90),
    maxLat: z.number().min(-90).max(90),
  })
  .refine((box) => box.minLon <= box.maxLon && box.minLat <= box.maxLat, {
    message: 'Box minimums must not exceed maximums',
  });

export type BoundingRegion = z.infer<typeof BoundingRegionSchema>;

export const RegionConfigSchema = z.object({
  /** PBF file name under OSM_DATA_DIR, when it is not `<code>-latest.osm.pbf` */
  sourceFile: z.string().min(1).optional(),
  include: z.array(BoundingRegionSchema).default([]),
  exclude: z.array(BoundingRegionSchema).default([]),
});

export type RegionConfig = z.infer<typeof RegionConfigSchema>;

export const CountrySchema = z.object({
  name: z.string().min(1),
  code: z
    .string()
    .regex(/^[a-z]{2}$/, 'Country codes are two lowercase letters')
    .nullable(),
});

export type Country = z.infer<typeof CountrySchema>;

const CountriesFileSchema = z.array(CountrySchema).superRefine((countries, ctx) => {
  const seen = new Set<string>();
  for (const country of countries) {
    if (seen.has(country.name)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Duplicate country: ${country.name}` });
    }
    seen.add(country.name);
  }
});

export const TerritoryRulesSchema = z.object({
  /** Plain substring replacement, optionally limited to some claimed countries */
  replacements: z
    .array(
      z.object({
        variant: z.string().min(1),
        replacement: z.string(),
        countries: z.array(z.string()).optional(),
      })
    )
    .default([]),
  /** Strip the geocoder's country and the variant, then append the territory name */
  appendTerritories: z
    .array(
      z.object({
        territory: z.string().min(1),
        variant: z.string().min(1),
      })
    )
    .default([]),
  /** Countries whose region check uses the claimed name instead of the geocoder's */
  claimedRegionCountries: z.array(z.string()).default([]),
});

export type TerritoryRules = z.infer<typeof TerritoryRulesSchema>;

const RegionsFileSchema = z.record(z.string().regex(/^[a-z]{2}$/), RegionConfigSchema);

export interface StaticData {
  countries: Country[];
  territories: TerritoryRules;
  regions: Record<string, RegionConfig>;
}

function readJson<T>(dir: string, file: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T {
  const path = join(dir, file);
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    throw new Error(`Could not read ${path}: ${error instanceof Error ? error.message : String(error)}`);
  }

  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
    throw new Error(`Invalid ${path}${where}: ${issue?.message ?? 'unknown error'}`);
  }
  return parsed.data;
}

export function loadStaticData(dir: string): StaticData {
  const data: StaticData = {
    countries: readJson(dir, 'countries.json', CountriesFileSchema),
    territories: readJson(dir, 'territories.json', TerritoryRulesSchema),
    regions: readJson(dir, 'regions.json', RegionsFileSchema),
  };

  logger.debug('Static data loaded', {
    dir,
    countries: data.countries.length,
    regions: Object.keys(data.regions).length,
  });

  return data;
}

export function findCountry(data: StaticData, name: string): Country | undefined {
  return data.countries.find((country) => country.name.toLowerCase() === name.toLowerCase());
}
