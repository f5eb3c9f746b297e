import type { FrameSource, Pose } from '../types.js';
import { attempt, type Outcome } from '../utils/outcome.js';

export type MoveResult = {
  success: boolean;
  errorCode?: string | number;
};

export type RobotLocation = {
  id: string;
  name: string;
  pose: Pose;
};

export interface RobotClient {
  connect(): Promise<Outcome<void>>;
  isConnected(): boolean;
  moveTo(pose: Pose, options: { wait: boolean }): Promise<Outcome<MoveResult>>;
  returnHome(): Promise<Outcome<void>>;
  cancelCommand(): Promise<Outcome<void>>;
  captureFrontFrame(): Promise<Outcome<Buffer | null>>;
  getSerial(): Promise<Outcome<string>>;
  getLocations(): Promise<Outcome<RobotLocation[]>>;
}

export function robotFrameSource(robot: RobotClient): FrameSource {
  return async () => {
    const frame = await attempt(() => robot.captureFrontFrame());
    return frame.ok && frame.value && frame.value.length > 0 ? frame.value : null;
  };
}
