export interface StateMachineConfig<TState extends string> {
    /** Allowed targets from each state. */
    transitions: Record<TState, readonly TState[]>;
    initial: TState;
    /** Prefix of LifecycleError messages. */
    name?: string;
}

export type TransitionListener<TState extends string> = (from: TState, to: TState) => void;
