import path from 'node:path';
import type { ConsolidatedSession, ConsolidatedView, Prompt } from './types.js';
import { formatSpan, formatTimestamp, pluralize } from '../utils/time.js';

export type RenderMode = 'verbose' | 'condensed';

export interface RenderOptions {
  /** Total prompt count at or below which every prompt is shown. */
  verboseThreshold: number;
  /** Condensed mode caps the file list at this many entries. */
  fileDisplayLimit: number;
  /** Where the full history can be read. */
  historyCommand?: string;
}

export const DEFAULT_HISTORY_COMMAND = 'promptrail history';

export function selectMode(promptCount: number, verboseThreshold: number): RenderMode {
  return promptCount <= verboseThreshold ? 'verbose' : 'condensed';
}

export function formatFileList(files: string[], max = Infinity): string {
  if (files.length === 0) return '';
  const shown = files.slice(0, max);
  const remaining = files.length - shown.length;
  const list = shown.join(', ');
  return remaining > 0 ? `${list} +${remaining} more` : list;
}

export function shortId(id: string): string {
  return id.slice(0, 8);
}

export function textLines(text: string): string[] {
  return text.split(/\r?\n/);
}

/** `2025-01-15 10:00, id: 1a2b3c4d, 3 prompts` plus the origin for linked sessions. */
export function describeSession(entry: ConsolidatedSession): string {
  const parts = [
    formatTimestamp(entry.session.startedAt),
    `id: ${shortId(entry.session.id)}`,
    pluralize(entry.prompts.length, 'prompt'),
  ];
  if (entry.linked) {
    parts.push(`linked from ${path.basename(entry.session.repoKey)}`);
  }
  return parts.join(', ');
}

export interface ViewBounds {
  first: Prompt;
  last: Prompt;
  span: string;
}

/**
 * First prompt of the earliest session, last prompt of the latest session,
 * and the time between the earliest and latest prompt anywhere in the view.
 */
export function viewBounds(view: ConsolidatedView): ViewBounds | null {
  if (view.sessions.length === 0) return null;

  const firstSession = view.sessions[0];
  const lastSession = view.sessions[view.sessions.length - 1];
  const first = firstSession.prompts[0];
  const last = lastSession.prompts[lastSession.prompts.length - 1];

  let earliest = first.timestamp;
  let latest = last.timestamp;
  for (const entry of view.sessions) {
    for (const prompt of entry.prompts) {
      if (prompt.timestamp < earliest) earliest = prompt.timestamp;
      if (prompt.timestamp > latest) latest = prompt.timestamp;
    }
  }

  return { first, last, span: formatSpan(earliest, latest) };
}
