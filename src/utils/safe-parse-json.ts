/**
 * Shared JSON parse for model output: strips markdown fences and retries with
 * single quotes normalized. Returns null when nothing object-like can be read.
 */
import { logger } from '@/services/logger';

function stripFences(raw: string): string {
  let txt = raw.trim();
  if (txt.startsWith('```')) {
    const firstNewline = txt.indexOf('\n');
    const lastFence = txt.lastIndexOf('```');
    if (firstNewline !== -1 && lastFence > firstNewline) {
      txt = txt.slice(firstNewline + 1, lastFence).trim();
    } else {
      txt = txt.replace(/^```\w*\n?/, '').replace(/\n?```$/, '').trim();
    }
  }
  return txt;
}

function tryParse(txt: string): object | null {
  try {
    const parsed: unknown = JSON.parse(txt);
    return typeof parsed === 'object' && parsed !== null ? parsed : null;
  } catch {
    return null;
  }
}

export function safeParseJson(raw: string, context: string): object | null {
  const txt = stripFences(raw);
  const parsed = tryParse(txt) ?? tryParse(txt.replace(/'/g, '"'));
  if (parsed === null) {
    logger.warn('safeParseJson:parse_error', { context, raw: txt.slice(0, 300) });
  }
  return parsed;
}
