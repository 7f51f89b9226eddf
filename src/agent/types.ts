/**
 * Contract with the agent orchestration runtime.
 */

export interface TurnRequest {
  projectId: string;
  branch: string;
  /** Resume token from the thread's previous successful turn */
  resumeToken?: string;
  text: string;
  /** Aborted on cancel or timeout; runners may ignore it */
  signal: AbortSignal;
  /** Receives streamed text deltas */
  onProgress?: (delta: string) => void;
}

export type TurnResult =
  | { status: "completed"; output: string; resumeToken?: string }
  | { status: "failed"; error: string; output?: string };

export interface AgentRunner {
  runTurn(request: TurnRequest): Promise<TurnResult>;
}

export interface ProjectDirectory {
  projectExists(projectId: string): Promise<boolean>;
}
