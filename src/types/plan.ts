export type PlanDirection = 'forward' | 'reverse';

export type CommandScope = 'dependencies' | 'single';

export interface InvocationTemplate {
  step: string;
  subcommand: string;
  args: string[];
}

export interface CommandPhase {
  direction: PlanDirection;
  templates: InvocationTemplate[];
}

export interface CommandTranslation {
  command: string;
  scope: CommandScope;
  phases: CommandPhase[];
}

export interface ExecutionPlan {
  direction: PlanDirection;
  stackKeys: string[];
}

export interface PlannedPhase extends ExecutionPlan {
  templates: InvocationTemplate[];
}

export interface CommandPlan {
  command: string;
  requestedStacks: string[];
  phases: PlannedPhase[];
}
