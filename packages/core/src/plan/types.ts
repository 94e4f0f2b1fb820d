/**
 * Plan & Step Types
 *
 * Planner input, the validated graph the scheduler drives, and the
 * snapshots handed to the control surface.
 */

// ============================================================================
// Statuses
// ============================================================================

export type PlanStatus = 'pending' | 'running' | 'succeeded' | 'failed' | 'cancelled';

export type StepStatus =
  | 'pending'
  | 'ready'
  | 'running'
  | 'succeeded'
  | 'failed'
  | 'skipped'
  | 'cancelled';

const TERMINAL_STEP_STATUSES: ReadonlySet<StepStatus> = new Set<StepStatus>([
  'succeeded',
  'failed',
  'skipped',
  'cancelled',
]);

const TERMINAL_PLAN_STATUSES: ReadonlySet<PlanStatus> = new Set<PlanStatus>([
  'succeeded',
  'failed',
  'cancelled',
]);

export function isTerminalStepStatus(status: StepStatus): boolean {
  return TERMINAL_STEP_STATUSES.has(status);
}

export function isTerminalPlanStatus(status: PlanStatus): boolean {
  return TERMINAL_PLAN_STATUSES.has(status);
}

// ============================================================================
// Planner input
// ============================================================================

export interface PlanStepInput {
  /** Unique within the plan */
  id: string;
  /** Capability tag selecting the agent, e.g. 'search' */
  capability: string;
  /** Values may contain {{stepId.path}} placeholders or { $ref, path } objects */
  parameters?: Record<string, unknown>;
  dependsOn?: string[];
  /** Overrides the capability / engine timeout for this step */
  timeoutMs?: number;
  /** Overrides the engine retry budget for this step */
  maxRetries?: number;
}

export interface PlanInput {
  goal: string;
  steps: PlanStepInput[];
}

// ============================================================================
// References & parameter templates
// ============================================================================

export type PathSegment = string | number;

/**
 * Pointer into another step's result: the whole value when `path` is empty.
 */
export interface StepReference {
  readonly stepId: string;
  readonly path: readonly PathSegment[];
}

/**
 * Compiled parameter value. References are explicit nodes so the
 * validator can check them and the scheduler can resolve them without
 * re-parsing strings.
 */
export type ParameterTemplate =
  | { readonly kind: 'literal'; readonly value: unknown }
  | { readonly kind: 'reference'; readonly reference: StepReference }
  | { readonly kind: 'interpolation'; readonly parts: ReadonlyArray<string | StepReference> }
  | { readonly kind: 'array'; readonly items: readonly ParameterTemplate[] }
  | { readonly kind: 'object'; readonly entries: Readonly<Record<string, ParameterTemplate>> };

// ============================================================================
// Validated plan
// ============================================================================

export interface ValidatedStep {
  readonly id: string;
  readonly capability: string;
  /** Parameters as the planner sent them */
  readonly rawParameters: Readonly<Record<string, unknown>>;
  readonly parameters: Readonly<Record<string, ParameterTemplate>>;
  readonly references: readonly StepReference[];
  /** Deduplicated, in declaration order */
  readonly dependsOn: readonly string[];
  /** Steps that list this one in dependsOn */
  readonly dependents: readonly string[];
  /** Readiness seed: 'ready' iff the step has no dependencies */
  readonly initialStatus: 'ready' | 'pending';
  readonly timeoutMs?: number;
  readonly maxRetries?: number;
}

export interface ValidatedPlan {
  readonly goal: string;
  /** Input order */
  readonly steps: readonly ValidatedStep[];
  /** One topological order of step ids */
  readonly order: readonly string[];
}

// ============================================================================
// Snapshots
// ============================================================================

export interface StepErrorDescriptor {
  readonly code: string;
  readonly message: string;
  readonly transient: boolean;
}

export interface StepSnapshot {
  readonly id: string;
  readonly capability: string;
  readonly dependsOn: readonly string[];
  readonly status: StepStatus;
  readonly retryCount: number;
  /** Present once the step succeeded */
  readonly result?: unknown;
  readonly error?: StepErrorDescriptor;
  readonly startedAt?: string;
  readonly finishedAt?: string;
}

export interface PlanSnapshot {
  readonly id: string;
  readonly goal: string;
  readonly status: PlanStatus;
  readonly createdAt: string;
  readonly startedAt?: string;
  readonly finishedAt?: string;
  readonly cancelRequested: boolean;
  readonly steps: readonly StepSnapshot[];
  readonly counts: Readonly<Record<StepStatus, number>>;
}
