export type TokenUsage = {
  input: number;
  output: number;
  total: number;
};

export const EMPTY_USAGE: TokenUsage = Object.freeze({ input: 0, output: 0, total: 0 });

export type PatrolPoint = {
  id?: string;
  name: string;
  x: number;
  y: number;
  theta: number;
  prompt?: string;
  enabled: boolean;
};

export type Pose = {
  x: number;
  y: number;
  theta: number;
};

export type RunStatus = 'Running' | 'Completed' | 'Patrol Stopped' | `Error: ${string}`;

export type PatrolRunRecord = {
  id: number;
  startTime: string;
  endTime: string | null;
  status: RunStatus;
  robotSerial: string | null;
  robotId: string | null;
  modelId: string | null;
  reportContent: string | null;
  tokenUsage: string | null;
  videoPath: string | null;
  videoAnalysis: string | null;
  tokens: Record<TokenCategoryName, TokenUsage>;
  totals: TokenUsage;
};

export type TokenCategoryName = 'inspection' | 'report' | 'telegram' | 'video';

export type InspectionRecord = {
  id: number;
  runId: number;
  pointName: string;
  coordinateX: number | null;
  coordinateY: number | null;
  prompt: string;
  aiResponse: string;
  isNg: boolean;
  aiDescription: string;
  tokenUsage: string;
  usage: TokenUsage;
  imagePath: string;
  timestamp: string;
  robotMovingStatus: string;
  robotId: string | null;
};

export type StreamType = 'robot_camera' | 'external_rtsp';

export type LiveAlertRecord = {
  id?: number;
  runId: number;
  rule: string;
  response: string;
  imagePath: string;
  timestamp: string;
  streamSource: string;
  streamId: string;
  robotId: string | null;
};

export type ScheduleEntry = {
  id: string;
  time: string;
  days: number[];
  enabled: boolean;
};

export type InspectionSummary = {
  point: string;
  result: string;
};

export type FrameSource = () => Promise<Buffer | null>;
