/**
 * Zod schemas for the MCP tools
 */

import { z } from 'zod';

/** Input schema for address_normalize */
export const AddressNormalizeInputSchema = z.object({
  text: z
    .string()
    .max(1000, 'Text too long')
    .describe('Address text to fingerprint (e.g., "12, Liberation Avenue, Banjul, Gambia")'),
});

export type AddressNormalizeInput = z.infer<typeof AddressNormalizeInputSchema>;

/** Input schema for address_penalty */
export const AddressPenaltyInputSchema = z.object({
  variants: z
    .array(z.string().max(1000))
    .max(500, 'At most 500 variants per call')
    .describe('Address variants describing one entity, in any order'),
});

export type AddressPenaltyInput = z.infer<typeof AddressPenaltyInputSchema>;

/** Input schema for pipeline_status */
export const PipelineStatusInputSchema = z.object({
  country: z
    .string()
    .min(1)
    .optional()
    .describe('Limit batch counts to one country (name as in countries.json)'),
});

export type PipelineStatusInput = z.infer<typeof PipelineStatusInputSchema>;
