export type AgentType = 'claude-code';

/** A prompt the user submitted to the assistant. */
export interface PromptEvent {
  /** The assistant's own conversation id. */
  sessionHint: string;
  cwd: string;
  text: string;
}

/** A tool the assistant ran while answering the latest prompt. */
export interface ToolUseEvent {
  sessionHint: string;
  cwd: string;
  toolName: string;
  filePath?: string;
}

/**
 * Turns an assistant's hook payload into capture events. A null result means
 * the payload carries nothing worth recording.
 */
export interface AgentAdapter {
  agentType: AgentType;
  parsePromptEvent(payload: unknown): PromptEvent | null;
  parseToolUseEvent(payload: unknown): ToolUseEvent | null;
}
