import { AgentStatus } from '@deskpilot/shared';

export interface AgentState {
  status: AgentStatus;
  detail: string;
  currentTask: string | null;
  paused: boolean;
}

export type StepOutcome =
  | { kind: 'continue' }
  | { kind: 'done' }
  | { kind: 'aborted'; error: string };

export class AgentBusyError extends Error {
  constructor(currentTask: string | null) {
    super(`Agent is already running a task: ${currentTask ?? 'unknown'}`);
    this.name = 'AgentBusyError';
  }
}
