import type { ActivitySample, ProbeTarget } from '../activity-probe';
import type { LoggerService } from '../logger';
import type { ShutdownPlan } from '../shutdown-sequencer';

export type InactivityMonitorState = 'idle-tracking' | 'suspended';

export type SuspendReason =
  | 'manual-stop'
  | 'deactivated'
  | 'left-running'
  | 'probe-failed'
  | 'threshold'
  | 'not-started';

export interface InactivityWindow {
  accumulatedIdleSeconds: number;
  limitSeconds: number;
  /** Last time players were seen, or when tracking started */
  lastActiveAt: number;
}

export interface ActivitySampler {
  sample(target: ProbeTarget): Promise<ActivitySample>;
}

export interface InactivityMonitorOptions {
  logger: LoggerService;
  probe: ActivitySampler;
  target: ProbeTarget;
  limitSeconds: number;
  intervalSeconds: number;
  /** Consecutive unreachable ticks before the monitor gives up (default 3) */
  unreachableTickLimit?: number;
  sleepHostAfter: boolean;
  shutdownAppAfter: boolean;
  /** Receives the plan once the threshold is crossed */
  onThreshold: (plan: ShutdownPlan) => void | Promise<void>;
  now?: () => number;
}

export type InactivityMonitorEventMap = {
  tick: { sample: ActivitySample; window: InactivityWindow };
  'probe-failed': { consecutiveFailures: number; sample: ActivitySample };
  threshold: { plan: ShutdownPlan; window: InactivityWindow };
  'state-changed': { state: InactivityMonitorState; reason?: SuspendReason };
};
