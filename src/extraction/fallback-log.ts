/**
 * Append-only JSONL log of batches the store could not take
 *
 * One line per batch: `{"countryCode","countryName","ids","status":"origin"}`.
 * `import-fallback` replays the file into the store once it is back.
 */

import { appendFileSync, existsSync, mkdirSync, readFileSync } from 'node:fs';
import { dirname } from 'node:path';
import { z } from 'zod';
import { logger } from '../domain/logger.js';
import type { BatchDraft, BatchLog } from './types.js';

const FallbackLineSchema = z.object({
  countryCode: z.string(),
  countryName: z.string(),
  ids: z.array(z.string().regex(/^[NWR]\d+$/)).min(1),
  status: z.literal('origin'),
});

function isElementRef(id: string): id is BatchDraft['ids'][number] {
  return /^[NWR]\d+$/.test(id);
}

export class FallbackLog implements BatchLog {
  readonly path: string;

  constructor(path: string) {
    this.path = path;
  }

  append(batches: readonly BatchDraft[]): void {
    if (batches.length === 0) {
      return;
    }
    mkdirSync(dirname(this.path), { recursive: true });
    const lines = batches
      .map((batch) =>
        JSON.stringify({
          countryCode: batch.countryCode,
          countryName: batch.countryName,
          ids: batch.ids,
          status: 'origin',
        })
      )
      .join('\n');
    appendFileSync(this.path, `${lines}\n`, 'utf-8');
  }

  /**
   * Read every well-formed line; malformed lines are logged and skipped
   */
  read(): BatchDraft[] {
    if (!existsSync(this.path)) {
      return [];
    }

    const drafts: BatchDraft[] = [];
    const lines = readFileSync(this.path, 'utf-8').split('\n');
    lines.forEach((line, index) => {
      if (!line.trim()) {
        return;
      }
      let parsed: z.SafeParseReturnType<unknown, z.infer<typeof FallbackLineSchema>>;
      try {
        parsed = FallbackLineSchema.safeParse(JSON.parse(line));
      } catch (error) {
        logger.warn('Unreadable fallback log line', {
          path: this.path,
          line: index + 1,
          error: error instanceof Error ? error.message : String(error),
        });
        return;
      }
      if (!parsed.success) {
        logger.warn('Malformed fallback log line', { path: this.path, line: index + 1 });
        return;
      }
      drafts.push({
        countryCode: parsed.data.countryCode,
        countryName: parsed.data.countryName,
        ids: parsed.data.ids.filter(isElementRef),
      });
    });
    return drafts;
  }
}
