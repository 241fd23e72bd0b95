/**
 * address_normalize tool handler
 */

import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { canonicalize } from '../addresses/canonicalize.js';
import { extractFirstSection } from '../addresses/first-section.js';
import type { AddressNormalizeInput } from '../addresses/schemas.js';
import { logger } from '../domain/logger.js';
import { buildToolResponse } from '../domain/response-builder.js';

export async function handleAddressNormalize(input: AddressNormalizeInput): Promise<CallToolResult> {
  logger.debug('Handling address_normalize', { length: input.text.length });

  const normalization = canonicalize(input.text);
  const firstSection = extractFirstSection(input.text);

  const summary = normalization
    ? `Fingerprint: ${normalization}\nFirst section: ${firstSection || '(empty)'}`
    : 'The text has no words long enough to fingerprint.';

  return buildToolResponse({ text: input.text, normalization, firstSection }, summary);
}
