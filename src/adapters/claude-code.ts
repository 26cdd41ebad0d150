import { z } from 'zod';
import type { AgentAdapter, PromptEvent, ToolUseEvent } from './types.js';
import { debug } from '../utils/logger.js';

// --- Hook payloads (only the fields we read) ---

const PromptPayload = z.object({
  session_id: z.string().min(1),
  cwd: z.string().min(1),
  prompt: z.string(),
});

const ToolUsePayload = z.object({
  session_id: z.string().min(1),
  cwd: z.string().min(1),
  tool_name: z.string().min(1),
  tool_input: z.record(z.unknown()).optional(),
});

// Text the assistant injects into the user turn rather than the user typing it
const META_PREFIXES = [
  '<local-command-',
  '<command-name>',
  '<system-reminder>',
  '[Request interrupted',
];

export function isMetaPrompt(text: string): boolean {
  const trimmed = text.trimStart();
  return META_PREFIXES.some((prefix) => trimmed.startsWith(prefix));
}

function targetPath(input: Record<string, unknown> | undefined): string | undefined {
  if (!input) return undefined;
  for (const key of ['file_path', 'notebook_path']) {
    const value = input[key];
    if (typeof value === 'string' && value) return value;
  }
  return undefined;
}

// --- Exported adapter ---

export const claudeCodeAdapter: AgentAdapter = {
  agentType: 'claude-code',

  parsePromptEvent(payload: unknown): PromptEvent | null {
    const parsed = PromptPayload.safeParse(payload);
    if (!parsed.success) {
      debug(`Unrecognized prompt payload: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
      return null;
    }

    const { session_id, cwd, prompt } = parsed.data;
    if (!prompt.trim() || isMetaPrompt(prompt)) return null;

    return { sessionHint: session_id, cwd, text: prompt };
  },

  parseToolUseEvent(payload: unknown): ToolUseEvent | null {
    const parsed = ToolUsePayload.safeParse(payload);
    if (!parsed.success) {
      debug(`Unrecognized tool payload: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
      return null;
    }

    const { session_id, cwd, tool_name, tool_input } = parsed.data;
    return {
      sessionHint: session_id,
      cwd,
      toolName: tool_name,
      filePath: targetPath(tool_input),
    };
  },
};
