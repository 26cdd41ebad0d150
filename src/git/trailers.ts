import type { ConsolidatedView } from '../provenance/types.js';
import {
  DEFAULT_HISTORY_COMMAND,
  describeSession,
  formatFileList,
  selectMode,
  textLines,
  viewBounds,
  type RenderOptions,
} from '../provenance/render.js';
import { pluralize } from '../utils/time.js';

export interface TrailerOptions extends RenderOptions {
  /** git's `core.commentChar`. */
  commentChar?: string;
}

const RULE_WIDTH = 56;
const HEADER = '── AI Provenance '.padEnd(RULE_WIDTH, '─');
const FOOTER = '─'.repeat(RULE_WIDTH);

function indented(text: string, first: string, rest: string): string[] {
  return textLines(text).map((line, i) => (i === 0 ? first : rest) + line);
}

function verboseBody(view: ConsolidatedView): string[] {
  const lines: string[] = [];
  view.sessions.forEach((entry, i) => {
    lines.push(`Session ${i + 1}  (${describeSession(entry)})`);
    for (const prompt of entry.prompts) {
      lines.push(...indented(prompt.text, '  • ', '    '));
    }
    lines.push('');
  });
  if (view.files.length > 0) {
    lines.push(`Files: ${formatFileList(view.files)}`, '');
  }
  return lines;
}

function condensedBody(view: ConsolidatedView, opts: RenderOptions): string[] {
  const bounds = viewBounds(view);
  if (!bounds) return [];

  const lines = [
    `${pluralize(view.promptCount, 'prompt')} · ${pluralize(view.sessions.length, 'session')} over ${bounds.span}`,
    '',
  ];
  view.sessions.forEach((entry, i) => {
    lines.push(`Session ${i + 1}  (${describeSession(entry)})`);
  });
  lines.push(
    '',
    ...indented(bounds.first.text, 'First: ', '       '),
    ...indented(bounds.last.text, 'Last:  ', '       '),
    '',
    `Full history: ${opts.historyCommand ?? DEFAULT_HISTORY_COMMAND}`,
    '',
  );
  if (view.files.length > 0) {
    lines.push(`Files: ${formatFileList(view.files, opts.fileDisplayLimit)}`, '');
  }
  return lines;
}

/**
 * Commit-message block for a consolidated view. Every line carries the
 * comment character so git strips the block from the stored message unless
 * the user uncomments it. An empty view renders as the empty string.
 */
export function renderCommitTrailer(
  view: ConsolidatedView,
  opts: TrailerOptions,
): string {
  if (view.promptCount === 0) return '';

  const body =
    selectMode(view.promptCount, opts.verboseThreshold) === 'verbose'
      ? verboseBody(view)
      : condensedBody(view, opts);

  const c = opts.commentChar ?? '#';
  // A line of bare indentation collapses to the comment char; prompt text
  // keeps its whitespace
  return [HEADER, '', ...body, FOOTER]
    .map((line) => (line.trim() ? `${c} ${line}` : c))
    .join('\n');
}
