// Caller roles and the supporting context assembled for each request

export type Role = 'analyst' | 'data_scientist' | 'production';

export interface RoleProfile {
  readonly role: Role;
  readonly budgetFraction: number;   // share of the base token budget, 0-1
}

// Truncation drops sections from the end of this list first
export type ContextPriority = 'entities' | 'explanatory' | 'historical';

export interface ContextSection {
  readonly priority: ContextPriority;
  readonly label: string;
  readonly text: string;
}

export interface ContextSources {
  readonly explanations: Readonly<Partial<Record<Role, readonly string[]>>>;
  readonly history: readonly string[];
}

export interface AssembledContext {
  readonly sections: readonly ContextSection[];
  readonly usedTokens: number;
  readonly budgetTokens: number;
  readonly dropped: Readonly<Record<ContextPriority, number>>;
}

export interface BuiltContext extends RoleProfile {
  readonly budgetTokens: number;
  readonly context: AssembledContext;
}
