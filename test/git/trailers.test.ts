import type BetterSqlite3 from 'better-sqlite3';
import { renderCommitTrailer } from '../../src/git/trailers.js';
import { consolidate } from '../../src/provenance/consolidate.js';
import type { ConsolidatedView, ToolCallInput } from '../../src/provenance/types.js';
import { upsertRepoLink } from '../../src/store/links.js';
import { getUncommitted, recordPrompt } from '../../src/store/prompts.js';
import { at, createTestDb } from '../helpers.js';

const HEADER = '# ── AI Provenance ' + '─'.repeat(39);
const FOOTER = '# ' + '─'.repeat(56);
const defaults = { verboseThreshold: 5, fileDisplayLimit: 8 };

describe('renderCommitTrailer', () => {
  let db: BetterSqlite3.Database;

  function record(text: string, minutes: number, repoKey = '/r', toolCalls?: ToolCallInput[]) {
    return recordPrompt(
      db,
      { repoKey, text, timestamp: at(minutes), toolCalls },
      { inactivityWindowMs: 30 * 60 * 1000 },
    );
  }

  function view(repoKey = '/r'): ConsolidatedView {
    return consolidate(db, repoKey, getUncommitted(db, repoKey));
  }

  beforeEach(() => {
    db = createTestDb();
  });

  afterEach(() => {
    db.close();
  });

  it('renders nothing for an empty view', () => {
    expect(renderCommitTrailer(view(), defaults)).toBe('');
  });

  it('lists every prompt of a small session', () => {
    const a = record('a', 0);
    record('b', 2);
    record('c', 4);
    const id = a.sessionId.slice(0, 8);

    expect(renderCommitTrailer(view(), defaults)).toBe(
      [
        HEADER,
        '#',
        `# Session 1  (2025-01-15 10:00, id: ${id}, 3 prompts)`,
        '#   • a',
        '#   • b',
        '#   • c',
        '#',
        FOOTER,
      ].join('\n'),
    );
  });

  it('lists files touched across sessions', () => {
    const first = record('add parser', 0, '/r', [
      { toolName: 'Write', filePath: '/r/src/parser.ts' },
      { toolName: 'Read', filePath: '/r/README.md' },
    ]);
    const second = record('fix parser', 45, '/r', [{ toolName: 'Edit', filePath: '/r/src/parser.ts' }]);

    expect(renderCommitTrailer(view(), defaults)).toBe(
      [
        HEADER,
        '#',
        `# Session 1  (2025-01-15 10:00, id: ${first.sessionId.slice(0, 8)}, 1 prompt)`,
        '#   • add parser',
        '#',
        `# Session 2  (2025-01-15 10:45, id: ${second.sessionId.slice(0, 8)}, 1 prompt)`,
        '#   • fix parser',
        '#',
        '# Files: src/parser.ts, README.md',
        '#',
        FOOTER,
      ].join('\n'),
    );
  });

  it('indents continuation lines of multi-line prompts', () => {
    record('first line\n\nsecond line', 0);
    const lines = renderCommitTrailer(view(), defaults).split('\n');
    expect(lines.slice(3, 6)).toEqual(['#   • first line', '#', '#     second line']);
  });

  it('keeps trailing whitespace inside prompt text', () => {
    record('keep this  \nand   ', 0);
    const lines = renderCommitTrailer(view(), defaults).split('\n');
    expect(lines.slice(3, 5)).toEqual(['#   • keep this  ', '#     and   ']);
  });

  it('stays verbose at exactly the threshold', () => {
    for (let i = 1; i <= 5; i++) record(`prompt ${i}`, i);
    const text = renderCommitTrailer(view(), defaults);
    expect(text).toContain('#   • prompt 3');
    expect(text).not.toContain('First:');
  });

  it('condenses one prompt past the threshold', () => {
    const texts = ['prompt one', 'prompt two', 'prompt three', 'prompt four', 'prompt five', 'prompt six'];
    const first = record(texts[0], 0);
    texts.slice(1).forEach((text, i) => record(text, (i + 1) * 2));

    expect(renderCommitTrailer(view(), defaults)).toBe(
      [
        HEADER,
        '#',
        '# 6 prompts · 1 session over 10m',
        '#',
        `# Session 1  (2025-01-15 10:00, id: ${first.sessionId.slice(0, 8)}, 6 prompts)`,
        '#',
        '# First: prompt one',
        '# Last:  prompt six',
        '#',
        '# Full history: promptrail history',
        '#',
        FOOTER,
      ].join('\n'),
    );
  });

  it('forces condensed mode with a threshold of 0', () => {
    record('only', 0);
    const lines = renderCommitTrailer(view(), { ...defaults, verboseThreshold: 0 }).split('\n');
    expect(lines[2]).toBe('# 1 prompt · 1 session over 0s');
    expect(lines).toContain('# First: only');
    expect(lines).toContain('# Last:  only');
  });

  it('caps the file list in condensed mode', () => {
    record('touch files', 0, '/r', ['a.ts', 'b.ts', 'c.ts', 'd.ts'].map((f) => ({ toolName: 'Edit', filePath: f })));
    record('again', 90);

    const lines = renderCommitTrailer(view(), { verboseThreshold: 1, fileDisplayLimit: 2 }).split('\n');
    expect(lines[2]).toBe('# 2 prompts · 2 sessions over 1h 30m');
    expect(lines).toContain('# Files: a.ts, b.ts +2 more');
  });

  it('names the origin of linked sessions', () => {
    const p = record('cross edit', 0, '/work/app', [{ toolName: 'Edit', filePath: '/work/lib/x.ts' }]);
    upsertRepoLink(db, p.sessionId, '/work/lib', '/work/lib/x.ts');

    const lines = renderCommitTrailer(view('/work/lib'), defaults).split('\n');
    expect(lines[2]).toBe(
      `# Session 1  (2025-01-15 10:00, id: ${p.sessionId.slice(0, 8)}, 1 prompt, linked from app)`,
    );
    expect(lines).toContain('# Files: x.ts');
  });

  it('uses the configured comment character', () => {
    record('a', 0);
    const lines = renderCommitTrailer(view(), { ...defaults, commentChar: ';' }).split('\n');
    expect(lines[0]).toBe(';' + HEADER.slice(1));
    expect(lines[1]).toBe(';');
    expect(lines[3]).toBe(';   • a');
  });
});
