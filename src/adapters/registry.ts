import type { AgentType, AgentAdapter } from './types.js';
import { claudeCodeAdapter } from './claude-code.js';

const adapters = new Map<AgentType, AgentAdapter>([
  ['claude-code', claudeCodeAdapter],
]);

export function getAdapter(agentType: string): AgentAdapter | undefined {
  for (const [type, adapter] of adapters) {
    if (type === agentType) return adapter;
  }
  return undefined;
}

export function getDefaultAdapter(): AgentAdapter {
  return claudeCodeAdapter;
}

export function getAgentTypes(): AgentType[] {
  return Array.from(adapters.keys());
}
