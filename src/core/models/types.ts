export type AngleSample = {
  angle_deg: number;
  t: number;
};

export type BatterySample = {
  voltage: number;
  t: number;
};

export type SessionConfig = {
  deadzone_deg: number;
  angleMaxForward_deg: number;
  angleMaxReverse_deg: number;
  gammaForward: number;
  gammaReverse: number;
  vMax: number;             // px/s
  vRevMax: number;          // px/s
  aMax: number;             // px/s²
  aRevMax: number;          // px/s²
  drag: number;
  pxPerM: number;
  startCountdown_s: number;
  targetFront_deg: number;
  targetBack_deg: number;
  enter_deg: number;
  exit_deg: number;
  repTime_s: number;
  restTime_s: number;
  repsEach: number;
  settleTol_deg: number;
  settleTime_s: number;
  settleMax_s: number;
  calibrationWindow_s: number;
  lowBattery_v: number;
};

export type SensorSettings = {
  port: string | null;
  baudRate: number;
  nameHint: string;
  filterAlpha: number;
  discoveryRetryMs: number;
  reconnectDelayMs: number;
};

export type PhaseKind = 'REP_BACK' | 'REP_FRONT' | 'TRANSITION' | 'REST';

export type PhaseSpec = {
  kind: PhaseKind;
  duration_s: number;
};

export type RepDirection = 'TRÁS' | 'FRENTE';

export type DirectionState = 'neutral' | 'forward' | 'reverse';

export type Lifecycle = 'NOT_STARTED' | 'COUNTDOWN' | 'RUNNING' | 'COMPLETE';

export type CalibrationState = {
  active: boolean;
  elapsed_s: number;
  sum: number;
  count: number;
  zero_deg: number;
};

export type RepMetrics = {
  extreme_deg: number | null;
  hit: boolean;
  elapsed_s: number;
  timeToTarget_s: number | null;
};

export type RepRecord = {
  readonly direction: RepDirection;
  readonly extreme_deg: number;
  readonly timeToTarget_s: number | null;
};

export type Actuation = {
  throttle: number;
  reverse: number;
};

export type KinematicState = {
  speed: number;       // px/s, signed
  distance: number;    // px, signed
  absDistance_m: number;
  movingTime_s: number;
  scroll: { road: number; mid: number; far: number };
};

export type SessionState = {
  lifecycle: Lifecycle;
  countdownLeft_s: number;
  phases: readonly PhaseSpec[];
  phaseIndex: number;
  phaseLeft_s: number;
  settleOk_s: number;
  settleTotal_s: number;
  repsCompleted: number;
  elapsed_s: number;
  rep: RepMetrics;
  report: readonly RepRecord[];
  calibration: CalibrationState;
  direction: DirectionState;
  raw_deg: number;
  angle_deg: number;
  angleRate_dps: number;
  actuation: Actuation;
  kinematics: KinematicState;
};

export type TickInput = {
  angle_deg: number;
  dt: number;
};

export type SessionReport = {
  reps: readonly RepRecord[];
  repsCompleted: number;
  repsTotal: number;
  totalTime_s: number;
  avgSpeed_kmh: number;
};
