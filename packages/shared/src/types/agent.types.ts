export type AgentStatus =
  | "IDLE"
  | "RUNNING"
  | "PAUSED"
  | "DONE"
  | "ABORTED"
  | "ERROR";

export type ModelServerStatus = "STANDBY" | "STARTING" | "ONLINE" | "ERROR";

export type TaskResult = {
  success: boolean;
  message: string;
  stepsTaken: number;
  durationSeconds: number;
  error?: string;
};

export type StatusEvent = {
  status: AgentStatus;
  detail: string;
  timestamp: string;
};

export type ThoughtEvent = {
  text: string;
  timestamp: string;
};

export type ActionEvent = {
  kind: string;
  target: string;
  timestamp: string;
};

export type FrameEvent = {
  /** Base64 PNG. */
  image: string;
  width: number;
  height: number;
  timestamp: string;
};

export type ModelServerEvent = {
  status: ModelServerStatus;
  timestamp: string;
};

export type AgentEventName =
  | "status"
  | "thought"
  | "action"
  | "frame"
  | "model_server";
