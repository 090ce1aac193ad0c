/**
 * Core domain types for stepcoach.
 * Shared across grammar, planning, perception and the execution engine.
 */

export type SkillKind =
  | 'single-click'
  | 'double-click'
  | 'right-click'
  | 'drag-to'
  | 'scroll-up'
  | 'scroll-down'
  | 'type-text'
  | 'press-key'
  | 'key-combination'
  | 'wait-duration'
  | 'wait-for-element'
  | 'done';

export type SystemElementId =
  | 'close-button'
  | 'minimize-button'
  | 'maximize-button'
  | 'restore-button'
  | 'title-bar'
  | 'menu-bar'
  | 'status-bar'
  | 'scroll-bar'
  | 'start-button'
  | 'taskbar'
  | 'system-tray'
  | 'search-box'
  | 'desktop'
  | 'ok-button'
  | 'cancel-button'
  | 'yes-button'
  | 'no-button'
  | 'apply-button'
  | 'text-input'
  | 'password-input'
  | 'dropdown'
  | 'checkbox'
  | 'radio-button'
  | 'back-button'
  | 'forward-button'
  | 'refresh-button'
  | 'home-button';

/**
 * What a step acts on: free text from the planner, plus a catalog id when
 * the text names a well-known piece of OS chrome.
 */
export interface TargetDescriptor {
  text: string;
  element?: SystemElementId;
}

export type Skill =
  | { kind: 'single-click'; target: TargetDescriptor }
  | { kind: 'double-click'; target: TargetDescriptor }
  | { kind: 'right-click'; target: TargetDescriptor }
  | { kind: 'drag-to'; target: TargetDescriptor; destination: TargetDescriptor }
  | { kind: 'scroll-up'; region?: TargetDescriptor }
  | { kind: 'scroll-down'; region?: TargetDescriptor }
  | { kind: 'type-text'; text: string }
  | { kind: 'press-key'; key: string }
  | { kind: 'key-combination'; keys: string[] }
  | { kind: 'wait-duration'; seconds: number }
  | { kind: 'wait-for-element'; target: TargetDescriptor }
  | { kind: 'done' };

export type SkillOf<K extends SkillKind> = Extract<Skill, { kind: K }>;

export interface Step {
  /** 1-based, contiguous within its plan. */
  readonly number: number;
  readonly skill: Skill;
  /** Plain-language instruction shown to the user. */
  readonly instruction: string;
  readonly expectedResult: string;
  readonly recoveryHint: string;
  readonly visualHint: string;
}

export type PlanPhase = 'initial' | 'replanned';

export interface Plan {
  id: string;
  goal: string;
  steps: Step[];
  /** References to knowledge the plan was built from. */
  sources: string[];
  phase: PlanPhase;
  createdAt: number;
}

export interface Intent {
  goal: string;
  targetApp?: string;
  targetState?: string;
  successCriteria?: string[];
}

export type PageStatus = 'normal' | 'loading' | 'error' | 'dialog' | 'login' | 'unknown';

export interface ScreenState {
  appName: string;
  screenType: string;
  pageStatus: PageStatus;
  description: string;
  elements: string[];
  suggestedAction?: string;
  warnings: string[];
}

export interface SnapshotImage {
  /** Base64 without a data-URL prefix. */
  data: string;
  mimeType: 'image/png' | 'image/jpeg' | 'image/webp' | 'image/gif';
}

export interface Snapshot {
  id: string;
  capturedAt: number;
  image?: SnapshotImage;
  state?: ScreenState;
}

export type ChangeClassification = 'loading' | 'error' | 'unchanged' | 'changed';

export type UnchangedCause = 'user-action' | 'dynamic-effect' | 'none';

export interface UnchangedExplanation {
  cause: UnchangedCause;
  description: string;
}

export interface GoalJudgment {
  achieved: boolean;
  reason: string;
}

export interface StepJudgment {
  success: boolean;
  changes: string;
  reason: string;
}

export interface KnowledgeHint {
  context: string;
  sources: string[];
}

export type StepPhase = 'Pending' | 'WaitingForCompletion' | 'Verifying';

export type StepVerdict =
  | { kind: 'Success'; reason: string }
  | { kind: 'NeedsRetry'; reason: string }
  | { kind: 'NeedsReplan'; reason: string }
  | { kind: 'TaskComplete'; reason: string }
  | { kind: 'ContinueWaiting'; reason: string };

export type RunFailureKind = 'PlanEmpty' | 'GoalUnreachable' | 'Cancelled' | 'UnsafeGoal';

export type RunStatus = 'completed' | 'failed';

export interface StepRecord {
  stepNumber: number;
  skill: SkillKind;
  instruction: string;
  classification?: ChangeClassification;
  verdict: StepVerdict['kind'];
  reason: string;
  at: number;
}

export interface RunStats {
  /** Steps that passed verification. */
  advances: number;
  /** Times a step was re-announced after a no-op. */
  retries: number;
  /** Verification attempts that found no effect. */
  noOps: number;
  replans: number;
  idleTimeouts: number;
  /** Completion events consumed. */
  waits: number;
}

export interface RunReport {
  runId: string;
  goal: string;
  status: RunStatus;
  reason: string;
  failure?: { kind: RunFailureKind; message: string };
  /** Shown instead of a raw error when the run fails. */
  helpMessage?: string;
  plan?: Plan;
  completedSteps: Step[];
  history: StepRecord[];
  stats: RunStats;
  startedAt: number;
  endedAt: number;
}

export interface Progress {
  current: number;
  total: number;
  instruction?: string;
}
