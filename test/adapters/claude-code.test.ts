import fs from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { claudeCodeAdapter, isMetaPrompt } from '../../src/adapters/claude-code.js';
import { getAdapter, getAgentTypes, getDefaultAdapter } from '../../src/adapters/registry.js';

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const FIXTURE_DIR = path.join(__dirname, '..', 'fixtures', 'claude-code');

function fixture(name: string): unknown {
  return JSON.parse(fs.readFileSync(path.join(FIXTURE_DIR, name), 'utf-8'));
}

describe('claude-code adapter: prompt events', () => {
  it('parses a submitted prompt', () => {
    expect(claudeCodeAdapter.parsePromptEvent(fixture('user-prompt-submit.json'))).toEqual({
      sessionHint: 'conv-0001',
      cwd: '/home/test/project',
      text: 'Add a retry wrapper around the HTTP client',
    });
  });

  it('keeps prompt text verbatim', () => {
    const event = claudeCodeAdapter.parsePromptEvent({
      session_id: 's',
      cwd: '/p',
      prompt: '  two\nlines  ',
    });
    expect(event?.text).toBe('  two\nlines  ');
  });

  it('skips injected and empty prompts', () => {
    for (const prompt of ['[Request interrupted by user]', '<command-name>/clear</command-name>', '   ']) {
      expect(claudeCodeAdapter.parsePromptEvent({ session_id: 's', cwd: '/p', prompt })).toBeNull();
    }
  });

  it('rejects payloads without the required fields', () => {
    expect(claudeCodeAdapter.parsePromptEvent({ cwd: '/p', prompt: 'x' })).toBeNull();
    expect(claudeCodeAdapter.parsePromptEvent(null)).toBeNull();
    expect(claudeCodeAdapter.parsePromptEvent('not an object')).toBeNull();
  });
});

describe('claude-code adapter: tool events', () => {
  it('parses an edit with its target file', () => {
    expect(claudeCodeAdapter.parseToolUseEvent(fixture('post-tool-use-edit.json'))).toEqual({
      sessionHint: 'conv-0001',
      cwd: '/home/test/project',
      toolName: 'Edit',
      filePath: '/home/test/project/src/http.ts',
    });
  });

  it('reads notebook paths', () => {
    expect(claudeCodeAdapter.parseToolUseEvent(fixture('post-tool-use-notebook.json'))?.filePath).toBe(
      '/home/test/project/analysis.ipynb',
    );
  });

  it('allows tools without a file', () => {
    const event = claudeCodeAdapter.parseToolUseEvent({
      session_id: 's',
      cwd: '/p',
      tool_name: 'Bash',
      tool_input: { command: 'ls' },
    });
    expect(event).toEqual({ sessionHint: 's', cwd: '/p', toolName: 'Bash', filePath: undefined });
  });
});

describe('isMetaPrompt', () => {
  it('detects assistant-injected text', () => {
    expect(isMetaPrompt('<system-reminder>context</system-reminder>')).toBe(true);
    expect(isMetaPrompt('<local-command-stdout>ok</local-command-stdout>')).toBe(true);
    expect(isMetaPrompt('Please fix the [Request interrupted] handling')).toBe(false);
  });
});

describe('adapter registry', () => {
  it('looks adapters up by agent type', () => {
    expect(getAdapter('claude-code')).toBe(claudeCodeAdapter);
    expect(getAdapter('unknown')).toBeUndefined();
    expect(getDefaultAdapter()).toBe(claudeCodeAdapter);
    expect(getAgentTypes()).toEqual(['claude-code']);
  });
});
